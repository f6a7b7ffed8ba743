import { DuplicateNameError } from "../core/errors.js";

import type { Component } from "./component.js";
import { assertEntityName } from "./entities.js";
import type {
  BehavioralUnitView,
  ComponentView,
  CompositionView,
  ContractView,
  EndpointView,
} from "./schema.js";

// =============================================================================
// COMPOSITION
// =============================================================================

export class Composition implements CompositionView {
  private readonly componentList: Component[] = [];
  private readonly componentsByName = new Map<string, Component>();

  constructor(readonly name: string) {
    assertEntityName("composition", name);
  }

  get components(): readonly Component[] {
    return this.componentList;
  }

  get size(): number {
    return this.componentList.length;
  }

  addComponent(component: Component): void {
    if (this.componentsByName.has(component.name)) {
      throw new DuplicateNameError("component", component.name, this.name);
    }
    this.componentList.push(component);
    this.componentsByName.set(component.name, component);
  }

  componentNames(): string[] {
    return this.componentList.map((component) => component.name);
  }

  component(name: string): Component | undefined {
    return this.componentsByName.get(name);
  }
}

// =============================================================================
// SNAPSHOTS
// =============================================================================

/**
 * Deep-copies a composition into frozen plain objects. A validation run reads only
 * this snapshot, so later registrations on the live model cannot change its result.
 */
export function captureCompositionView(composition: CompositionView): CompositionView {
  return Object.freeze({
    name: composition.name,
    components: Object.freeze(composition.components.map(captureComponent)),
  });
}

function captureComponent(component: ComponentView): ComponentView {
  const endpoints = component.endpoints.map(captureEndpoint);
  const byName = new Map(endpoints.map((endpoint) => [endpoint.name, endpoint]));

  return Object.freeze({
    name: component.name,
    type: component.type,
    endpoints: Object.freeze(endpoints),
    behavioralUnits: Object.freeze(component.behavioralUnits.map(captureBehavioralUnit)),
    contracts: Object.freeze(
      component.contracts.map((contract) => captureContract(contract, byName)),
    ),
  });
}

function captureEndpoint(endpoint: EndpointView): EndpointView {
  return Object.freeze({ name: endpoint.name, direction: endpoint.direction });
}

function captureBehavioralUnit(unit: BehavioralUnitView): BehavioralUnitView {
  return Object.freeze({ name: unit.name, trigger: unit.trigger, period: unit.period });
}

function captureContract(
  contract: ContractView,
  endpointsByName: Map<string, EndpointView>,
): ContractView {
  return Object.freeze({
    name: contract.name,
    kind: contract.kind,
    endpoints: Object.freeze(
      contract.endpoints.map(
        (endpoint) => endpointsByName.get(endpoint.name) ?? captureEndpoint(endpoint),
      ),
    ),
    dataFields: Object.freeze(
      contract.dataFields.map((field) => Object.freeze({ name: field.name, type: field.type })),
    ),
  });
}
