import os from "node:os";
import path from "node:path";

import fse from "fs-extra";
import { afterEach, describe, expect, it } from "vitest";

import { JsonlLogger } from "../core/logger.js";
import { Component } from "../model/component.js";
import { Composition } from "../model/composition.js";

import { buildValidationReport, validateComposition } from "./composition-validator.js";
import { sketchChain, sketchComposition } from "../__tests__/helpers/sketch.js";

function buildPlant(): Composition {
  const composition = new Composition("Plant");

  const sensor = new Component("Sensor", "Sensor");
  sensor.addEndpoint("speed", "outbound");
  sensor.addBehavioralUnit("tick", { trigger: "periodic" });

  const controller = new Component("Controller", "Controller");
  controller.addEndpoint("speed", "inbound");
  controller.addEndpoint("cmd", "outbound");

  composition.addComponent(sensor);
  composition.addComponent(controller);
  composition.addComponent(new Component("Actuator", "Actuator"));
  return composition;
}

const tempDirs: string[] = [];

afterEach(async () => {
  for (const dir of tempDirs.splice(0)) {
    await fse.remove(dir);
  }
});

describe("validateComposition", () => {
  it("returns structure, then endpoint, then topology findings", () => {
    const composition = sketchComposition("Mixed", {
      A: [["ab", "outbound"], ["ca", "inbound"], ["lonely", "outbound"]],
      B: [["ab", "inbound"], ["bc", "outbound"]],
      C: [["bc", "inbound"], ["ca", "outbound"]],
      Empty: [],
    });

    expect(validateComposition(composition).map((finding) => finding.code)).toEqual([
      "COMPONENT_WITHOUT_ENDPOINTS",
      "UNMATCHED_OUTBOUND_ENDPOINT",
      "TOPOLOGY_CYCLE",
    ]);
  });

  it("returns no findings for a long matched chain", () => {
    expect(validateComposition(sketchChain(20_000))).toEqual([]);
  });

  it("returns no findings for an empty composition", () => {
    expect(validateComposition(new Composition("Nothing"))).toEqual([]);
  });

  it("skips disabled checks", () => {
    const findings = validateComposition(buildPlant(), {
      checks: { structure: false, topology: false },
    });

    expect(findings.map((finding) => finding.code)).toEqual(["UNMATCHED_OUTBOUND_ENDPOINT"]);
  });

  it("does not change the composition it validates", () => {
    const composition = buildPlant();
    validateComposition(composition);

    expect(composition.componentNames()).toEqual(["Sensor", "Controller", "Actuator"]);
    expect(composition.component("Sensor")?.behavioralUnits[0].period).toBeNull();
  });
});

describe("buildValidationReport", () => {
  it("summarizes the composition alongside its findings", () => {
    const report = buildValidationReport(buildPlant());

    expect(report.composition).toBe("Plant");
    expect(report.valid).toBe(false);
    expect(report.findings.map((finding) => finding.code)).toEqual([
      "PERIODIC_UNIT_WITHOUT_PERIOD",
      "COMPONENT_WITHOUT_ENDPOINTS",
      "UNMATCHED_OUTBOUND_ENDPOINT",
    ]);
    expect(report.summary).toEqual({
      components: 3,
      endpoints: 3,
      links: 1,
      connected_groups: 2,
      findings: { structure: 2, "endpoint-matching": 1, topology: 0 },
    });
  });

  it("writes start, finding and completion events to the logger", async () => {
    const dir = await fse.mkdtemp(path.join(os.tmpdir(), "archweave-validate-"));
    tempDirs.push(dir);
    const logPath = path.join(dir, "validation.jsonl");
    const logger = new JsonlLogger(logPath, { runId: "run-1", source: "test" });

    buildValidationReport(buildPlant(), { logger });
    logger.close();

    const events = (await fse.readFile(logPath, "utf8"))
      .trim()
      .split("\n")
      .map((line) => JSON.parse(line));

    expect(events.map((event) => event.type)).toEqual([
      "validation.start",
      "validation.finding",
      "validation.finding",
      "validation.finding",
      "validation.complete",
    ]);
    expect(events[0]).toMatchObject({
      run_id: "run-1",
      source: "test",
      payload: {
        composition: "Plant",
        components: 3,
        checks: { structure: true, endpoints: true, topology: true },
      },
    });
    expect(events[1].payload).toEqual({
      category: "structure",
      code: "PERIODIC_UNIT_WITHOUT_PERIOD",
      component: "Sensor",
      subject: "tick",
      detail: "Behavioral unit 'tick' in component 'Sensor' is periodic but has no period defined.",
    });
    expect(events[4].payload).toEqual({
      composition: "Plant",
      valid: false,
      findings: { structure: 2, "endpoint-matching": 1, topology: 0 },
    });
  });
});
