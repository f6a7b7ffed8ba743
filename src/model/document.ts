// Composition document format.
// Purpose: export a composition as the JSON document tree and rebuild a Composition from one.
// Assumes documents come from files or the interactive builder; rebuilding always goes through
// the registration methods so construction errors surface exactly as they do in code.

import path from "node:path";

import yaml from "js-yaml";
import { z } from "zod";

import { DocumentError } from "../core/errors.js";
import { describeParseFailure, formatIssues } from "../core/parse-format.js";
import { readTextFile, writeTextFile } from "../core/utils.js";

import { Component } from "./component.js";
import { Composition } from "./composition.js";
import {
  CONTRACT_KINDS,
  ENDPOINT_DIRECTIONS,
  TRIGGER_KINDS,
  type CompositionView,
} from "./schema.js";

export const DEFAULT_EXPORT_INDENT = 4;

// Spellings written by earlier tooling; normalized on load, never written.
const LEGACY_ALIASES: Record<string, string> = {
  sender: "outbound",
  receiver: "inbound",
  "event-based": "event-driven",
  clientServer: "client-server",
  senderReceiver: "publish-subscribe",
};

// =============================================================================
// SCHEMAS
// =============================================================================

export function normalizeLegacyAlias(value: unknown): unknown {
  if (typeof value !== "string") return value;
  return LEGACY_ALIASES[value] ?? value;
}

const PortSchema = z
  .object({
    name: z.string().min(1),
    type: z.preprocess(normalizeLegacyAlias, z.enum(ENDPOINT_DIRECTIONS)),
  })
  .strict();

const RunnableSchema = z
  .object({
    name: z.string().min(1),
    trigger: z.preprocess(normalizeLegacyAlias, z.enum(TRIGGER_KINDS)),
    period: z.number().nullable().default(null),
  })
  .strict();

const DataElementSchema = z
  .object({
    name: z.string().min(1),
    type: z.string(),
  })
  .strict();

const InterfaceSchema = z
  .object({
    name: z.string().min(1),
    type: z.preprocess(normalizeLegacyAlias, z.enum(CONTRACT_KINDS)),
    associated_ports: z.array(z.string()).default([]),
    data_elements: z.array(DataElementSchema).default([]),
  })
  .strict();

const ComponentSchema = z
  .object({
    name: z.string().min(1),
    type: z.string(),
    ports: z.array(PortSchema).default([]),
    runnables: z.array(RunnableSchema).default([]),
    interfaces: z.array(InterfaceSchema).default([]),
  })
  .strict();

export const CompositionDocumentSchema = z
  .object({
    composition_name: z.string().min(1),
    components: z.array(ComponentSchema).default([]),
  })
  .strict();

export type CompositionDocument = z.infer<typeof CompositionDocumentSchema>;
export type ComponentDocument = z.infer<typeof ComponentSchema>;

// =============================================================================
// EXPORT
// =============================================================================

export function toCompositionDocument(composition: CompositionView): CompositionDocument {
  return {
    composition_name: composition.name,
    components: composition.components.map((component) => ({
      name: component.name,
      type: component.type,
      ports: component.endpoints.map((endpoint) => ({
        name: endpoint.name,
        type: endpoint.direction,
      })),
      runnables: component.behavioralUnits.map((unit) => ({
        name: unit.name,
        trigger: unit.trigger,
        period: unit.trigger === "periodic" ? unit.period : null,
      })),
      interfaces: component.contracts.map((contract) => ({
        name: contract.name,
        type: contract.kind,
        associated_ports: contract.endpoints.map((endpoint) => endpoint.name),
        data_elements: contract.dataFields.map((field) => ({ name: field.name, type: field.type })),
      })),
    })),
  };
}

export function serializeCompositionDocument(
  document: CompositionDocument,
  indent: number = DEFAULT_EXPORT_INDENT,
): string {
  return `${JSON.stringify(document, null, indent)}\n`;
}

/** Serializes fully before touching the file system; the composition is only read. */
export async function writeCompositionFile(
  composition: CompositionView,
  filePath: string,
  options: { indent?: number } = {},
): Promise<{ outputPath: string; bytes: number }> {
  const content = serializeCompositionDocument(toCompositionDocument(composition), options.indent);
  const outputPath = path.resolve(filePath);
  await writeTextFile(outputPath, content);
  return { outputPath, bytes: Buffer.byteLength(content, "utf8") };
}

// =============================================================================
// IMPORT
// =============================================================================

export function parseCompositionDocument(doc: unknown, source: string): CompositionDocument {
  const parsed = CompositionDocumentSchema.safeParse(doc);
  if (!parsed.success) {
    const details = formatIssues(parsed.error.issues);
    throw new DocumentError(`Invalid composition document at ${source}:\n${details}`, parsed.error);
  }
  return parsed.data;
}

export function compositionFromDocument(document: CompositionDocument): Composition {
  const composition = new Composition(document.composition_name);

  for (const entry of document.components) {
    composition.addComponent(componentFromDocument(entry));
  }

  return composition;
}

export async function loadCompositionFile(filePath: string): Promise<Composition> {
  const absolutePath = path.resolve(filePath);

  let raw: string;
  try {
    raw = await readTextFile(absolutePath);
  } catch (err) {
    throw new DocumentError(`Failed to read composition document at ${absolutePath}`, err);
  }

  const doc = parseRawDocument(raw, absolutePath);
  return compositionFromDocument(parseCompositionDocument(doc, absolutePath));
}

// =============================================================================
// INTERNALS
// =============================================================================

function componentFromDocument(entry: ComponentDocument): Component {
  const component = new Component(entry.name, entry.type);

  for (const port of entry.ports) {
    component.addEndpoint(port.name, port.type);
  }

  for (const contractEntry of entry.interfaces) {
    const contract = component.addContract(
      contractEntry.name,
      contractEntry.type,
      contractEntry.associated_ports,
    );
    for (const element of contractEntry.data_elements) {
      contract.addDataField(element.name, element.type);
    }
  }

  for (const runnable of entry.runnables) {
    component.addBehavioralUnit(runnable.name, {
      trigger: runnable.trigger,
      period: runnable.period,
    });
  }

  return component;
}

function parseRawDocument(raw: string, absolutePath: string): unknown {
  const extension = path.extname(absolutePath).toLowerCase();
  const isYaml = extension === ".yaml" || extension === ".yml";

  try {
    return isYaml ? yaml.load(raw) : JSON.parse(raw);
  } catch (err) {
    const format = isYaml ? "YAML" : "JSON";
    throw new DocumentError(
      `Failed to parse ${format} composition document at ${absolutePath}${describeParseFailure(err)}`,
      err,
    );
  }
}
