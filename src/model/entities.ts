// Leaf entities owned by a Component.
// Instances are created through Component registration methods, which enforce name
// uniqueness and endpoint ownership before anything is stored.

import {
  CompositionError,
  describeEntity,
  InvalidBehavioralUnitError,
  type NamedEntityKind,
} from "../core/errors.js";

import type {
  BehavioralUnitView,
  ContractKind,
  ContractView,
  DataFieldView,
  EndpointDirection,
  EndpointView,
  TriggerKind,
} from "./schema.js";

export class Endpoint implements EndpointView {
  constructor(
    readonly name: string,
    readonly direction: EndpointDirection,
  ) {}
}

export type BehavioralUnitOptions = {
  trigger: TriggerKind;
  /** Milliseconds. Required for periodic units; a missing one is reported by validation. */
  period?: number | null;
};

export class BehavioralUnit implements BehavioralUnitView {
  readonly trigger: TriggerKind;
  readonly period: number | null;

  constructor(
    readonly name: string,
    options: BehavioralUnitOptions,
  ) {
    const period = options.period ?? null;

    if (options.trigger === "event-driven" && period !== null) {
      throw new InvalidBehavioralUnitError(name, "event-driven units cannot have a period.");
    }
    if (options.trigger === "periodic" && period !== null && !isValidPeriod(period)) {
      throw new InvalidBehavioralUnitError(
        name,
        `period must be a positive whole number of milliseconds, received ${period}.`,
      );
    }

    this.trigger = options.trigger;
    this.period = period;
  }
}

export class DataField implements DataFieldView {
  constructor(
    readonly name: string,
    readonly type: string,
  ) {}
}

export class Contract implements ContractView {
  private readonly associated: Endpoint[] = [];
  private readonly fields: DataField[] = [];

  constructor(
    readonly name: string,
    readonly kind: ContractKind,
  ) {}

  get endpoints(): readonly Endpoint[] {
    return this.associated;
  }

  get dataFields(): readonly DataField[] {
    return this.fields;
  }

  addDataField(name: string, type: string): DataField {
    assertEntityName("data field", name);
    const field = new DataField(name, type);
    this.fields.push(field);
    return field;
  }

  /** Called by the owning Component once it has resolved the endpoint by name. */
  associate(endpoint: Endpoint): void {
    if (this.associated.includes(endpoint)) return;
    this.associated.push(endpoint);
  }
}

// =============================================================================
// HELPERS
// =============================================================================

export function assertEntityName(
  entity: NamedEntityKind | "data field" | "composition",
  name: string,
): void {
  if (name.trim().length === 0) {
    throw new CompositionError(`${describeEntity(entity, true)} name must not be empty.`);
  }
}

function isValidPeriod(period: number): boolean {
  return Number.isInteger(period) && period > 0;
}
