// Composition model vocabulary.
// Purpose: closed sets of directions, triggers and contract kinds shared by the model,
// the document format and the validators.

export const ENDPOINT_DIRECTIONS = ["outbound", "inbound"] as const;
export type EndpointDirection = (typeof ENDPOINT_DIRECTIONS)[number];

export const TRIGGER_KINDS = ["event-driven", "periodic"] as const;
export type TriggerKind = (typeof TRIGGER_KINDS)[number];

export const CONTRACT_KINDS = ["client-server", "publish-subscribe"] as const;
export type ContractKind = (typeof CONTRACT_KINDS)[number];

// =============================================================================
// READ-ONLY VIEWS
//
// Validators only read through these shapes. The model classes satisfy them
// structurally; plain objects do too, which is how a frozen snapshot is handed
// to a validation run.
// =============================================================================

export interface EndpointView {
  readonly name: string;
  readonly direction: EndpointDirection;
}

export interface BehavioralUnitView {
  readonly name: string;
  readonly trigger: TriggerKind;
  readonly period: number | null;
}

export interface DataFieldView {
  readonly name: string;
  readonly type: string;
}

export interface ContractView {
  readonly name: string;
  readonly kind: ContractKind;
  readonly endpoints: readonly EndpointView[];
  readonly dataFields: readonly DataFieldView[];
}

export interface ComponentView {
  readonly name: string;
  readonly type: string;
  readonly endpoints: readonly EndpointView[];
  readonly behavioralUnits: readonly BehavioralUnitView[];
  readonly contracts: readonly ContractView[];
}

export interface CompositionView {
  readonly name: string;
  readonly components: readonly ComponentView[];
}

// =============================================================================
// GUARDS
// =============================================================================

export function isEndpointDirection(value: string): value is EndpointDirection {
  return ENDPOINT_DIRECTIONS.some((kind) => kind === value);
}

export function isTriggerKind(value: string): value is TriggerKind {
  return TRIGGER_KINDS.some((kind) => kind === value);
}

export function isContractKind(value: string): value is ContractKind {
  return CONTRACT_KINDS.some((kind) => kind === value);
}
