// Interactive composition builder.
// Purpose: walk a user through components, ports, interfaces and runnables and build a
// Composition through the model's registration methods.
// Assumes the IO layer trims answers; construction errors are reported and the step retried.

import { Component } from "../model/component.js";
import { Composition } from "../model/composition.js";
import { normalizeLegacyAlias } from "../model/document.js";
import {
  isContractKind,
  isEndpointDirection,
  isTriggerKind,
  type ContractKind,
  type EndpointDirection,
  type TriggerKind,
} from "../model/schema.js";

import { CompositionError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export interface ComposeIo {
  ask(question: string): Promise<string>;
  note(message: string): void;
}

// =============================================================================
// SESSION
// =============================================================================

export async function runComposeSession(io: ComposeIo): Promise<Composition> {
  const composition = await askUntil(io, "Composition name", (answer) =>
    attempt(io, () => new Composition(answer)),
  );

  while (await confirm(io, "Add a component")) {
    const name = await io.ask("Component name");
    if (composition.component(name)) {
      io.note(`Error: a component named '${name}' already exists. Choose a different name.`);
      continue;
    }

    const type = await io.ask("Component type (e.g. Sensor, Controller)");
    const component = attempt(io, () => new Component(name, type));
    if (!component) continue;

    await collectPorts(io, component);
    await collectInterfaces(io, component);
    await collectRunnables(io, component);

    attempt(io, () => composition.addComponent(component));
  }

  return composition;
}

// =============================================================================
// STEPS
// =============================================================================

async function collectPorts(io: ComposeIo, component: Component): Promise<void> {
  while (await confirm(io, `Add a port to '${component.name}'`)) {
    const name = await io.ask("Port name");
    const direction = await askChoice(io, "Port direction (outbound/inbound)", parseDirection);
    attempt(io, () => component.addEndpoint(name, direction));
  }
}

async function collectInterfaces(io: ComposeIo, component: Component): Promise<void> {
  while (await confirm(io, `Add an interface to '${component.name}'`)) {
    const name = await io.ask("Interface name");
    const kind = await askChoice(
      io,
      "Interface kind (client-server/publish-subscribe)",
      parseContractKind,
    );
    const contract = attempt(io, () => component.addContract(name, kind));
    if (!contract) continue;

    while (await confirm(io, `Associate '${contract.name}' with a port`)) {
      const available = component.endpoints.map(
        (endpoint) => `${endpoint.name} (${endpoint.direction})`,
      );
      io.note(`Available ports: ${available.length > 0 ? available.join(", ") : "none"}`);
      const portName = await io.ask("Port name to associate");
      attempt(io, () => component.associateEndpoint(contract.name, portName));
    }

    while (await confirm(io, `Add a data element to '${contract.name}'`)) {
      const fieldName = await io.ask("Data element name");
      const fieldType = await io.ask("Data element type (e.g. int, float, string)");
      attempt(io, () => contract.addDataField(fieldName, fieldType));
    }
  }
}

async function collectRunnables(io: ComposeIo, component: Component): Promise<void> {
  while (await confirm(io, `Add a runnable to '${component.name}'`)) {
    const name = await io.ask("Runnable name");
    const trigger = await askChoice(io, "Trigger (event-driven/periodic)", parseTrigger);
    const period =
      trigger === "periodic"
        ? await askChoice(io, "Period in ms (leave empty if not known yet)", parsePeriod)
        : null;
    attempt(io, () => component.addBehavioralUnit(name, { trigger, period }));
  }
}

// =============================================================================
// PROMPT HELPERS
// =============================================================================

export type Parsed<T> = { ok: true; value: T } | { ok: false; message: string };

export async function confirm(io: ComposeIo, question: string): Promise<boolean> {
  return askChoice(io, `${question} (yes/no)`, parseYesNo);
}

async function askChoice<T>(
  io: ComposeIo,
  question: string,
  parse: (answer: string) => Parsed<T>,
): Promise<T> {
  while (true) {
    const parsed = parse(await io.ask(question));
    if (parsed.ok) return parsed.value;
    io.note(parsed.message);
  }
}

async function askUntil<T>(
  io: ComposeIo,
  question: string,
  build: (answer: string) => T | undefined,
): Promise<T> {
  while (true) {
    const built = build(await io.ask(question));
    if (built !== undefined) return built;
  }
}

function attempt<T>(io: ComposeIo, action: () => T): T | undefined {
  try {
    return action();
  } catch (err) {
    if (err instanceof CompositionError) {
      io.note(`Error: ${err.message}`);
      return undefined;
    }
    throw err;
  }
}

// =============================================================================
// PARSERS
// =============================================================================

export function parseYesNo(answer: string): Parsed<boolean> {
  const normalized = answer.trim().toLowerCase();
  if (normalized === "yes" || normalized === "y") return { ok: true, value: true };
  if (normalized === "no" || normalized === "n") return { ok: true, value: false };
  return { ok: false, message: "Please answer yes or no." };
}

export function parseDirection(answer: string): Parsed<EndpointDirection> {
  const value = normalizeChoice(answer);
  return isEndpointDirection(value)
    ? { ok: true, value }
    : { ok: false, message: "Direction must be outbound or inbound." };
}

export function parseTrigger(answer: string): Parsed<TriggerKind> {
  const value = normalizeChoice(answer);
  return isTriggerKind(value)
    ? { ok: true, value }
    : { ok: false, message: "Trigger must be event-driven or periodic." };
}

export function parseContractKind(answer: string): Parsed<ContractKind> {
  const value = normalizeChoice(answer);
  return isContractKind(value)
    ? { ok: true, value }
    : { ok: false, message: "Interface kind must be client-server or publish-subscribe." };
}

export function parsePeriod(answer: string): Parsed<number | null> {
  const trimmed = answer.trim();
  if (trimmed.length === 0) return { ok: true, value: null };
  if (!/^\d+$/.test(trimmed) || Number(trimmed) === 0) {
    return { ok: false, message: "Period must be a positive whole number of milliseconds." };
  }
  return { ok: true, value: Number(trimmed) };
}

function normalizeChoice(answer: string): string {
  const normalized = normalizeLegacyAlias(answer.trim());
  return typeof normalized === "string" ? normalized : answer.trim();
}
