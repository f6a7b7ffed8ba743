import { DuplicateNameError, UnknownContractError, UnknownEndpointError } from "../core/errors.js";

import {
  assertEntityName,
  BehavioralUnit,
  Contract,
  Endpoint,
  type BehavioralUnitOptions,
} from "./entities.js";
import type { ComponentView, ContractKind, EndpointDirection } from "./schema.js";

// =============================================================================
// COMPONENT
// =============================================================================

export class Component implements ComponentView {
  // Single ordered map: storage, uniqueness index and export order.
  private readonly endpointsByName = new Map<string, Endpoint>();
  private readonly units: BehavioralUnit[] = [];
  private readonly contractList: Contract[] = [];

  constructor(
    readonly name: string,
    readonly type: string,
  ) {
    assertEntityName("component", name);
  }

  get endpoints(): readonly Endpoint[] {
    return Array.from(this.endpointsByName.values());
  }

  get behavioralUnits(): readonly BehavioralUnit[] {
    return this.units;
  }

  get contracts(): readonly Contract[] {
    return this.contractList;
  }

  endpoint(name: string): Endpoint | undefined {
    return this.endpointsByName.get(name);
  }

  hasEndpoint(name: string): boolean {
    return this.endpointsByName.has(name);
  }

  contract(name: string): Contract | undefined {
    return this.contractList.find((contract) => contract.name === name);
  }

  // ---------------------------------------------------------------------------
  // Registration
  // ---------------------------------------------------------------------------

  addEndpoint(name: string, direction: EndpointDirection): Endpoint {
    assertEntityName("endpoint", name);
    if (this.hasEndpoint(name)) {
      throw new DuplicateNameError("endpoint", name, this.name);
    }

    const endpoint = new Endpoint(name, direction);
    this.endpointsByName.set(name, endpoint);
    return endpoint;
  }

  addBehavioralUnit(name: string, options: BehavioralUnitOptions): BehavioralUnit {
    assertEntityName("behavioral unit", name);
    if (this.units.some((unit) => unit.name === name)) {
      throw new DuplicateNameError("behavioral unit", name, this.name);
    }

    const unit = new BehavioralUnit(name, options);
    this.units.push(unit);
    return unit;
  }

  /**
   * Registers a contract and associates it with endpoints of this component.
   * Every endpoint name is resolved before the contract is stored, so an unknown
   * name leaves the component unchanged.
   */
  addContract(name: string, kind: ContractKind, endpointNames: readonly string[] = []): Contract {
    assertEntityName("contract", name);
    if (this.contract(name)) {
      throw new DuplicateNameError("contract", name, this.name);
    }

    const endpoints = endpointNames.map((endpointName) => this.requireEndpoint(endpointName));
    const contract = new Contract(name, kind);
    for (const endpoint of endpoints) {
      contract.associate(endpoint);
    }

    this.contractList.push(contract);
    return contract;
  }

  associateEndpoint(contractName: string, endpointName: string): Contract {
    const contract = this.contract(contractName);
    if (!contract) {
      throw new UnknownContractError(contractName, this.name);
    }

    contract.associate(this.requireEndpoint(endpointName));
    return contract;
  }

  private requireEndpoint(endpointName: string): Endpoint {
    const endpoint = this.endpoint(endpointName);
    if (!endpoint) {
      throw new UnknownEndpointError(endpointName, this.name);
    }
    return endpoint;
  }
}
