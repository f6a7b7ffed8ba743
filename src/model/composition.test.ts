import { describe, expect, it } from "vitest";

import { DuplicateNameError } from "../core/errors.js";

import { Component } from "./component.js";
import { Composition, captureCompositionView } from "./composition.js";

function buildPipeline(): Composition {
  const composition = new Composition("Pipeline");

  const sensor = new Component("Sensor", "Sensor");
  sensor.addEndpoint("speed", "outbound");
  sensor.addBehavioralUnit("sample", { trigger: "periodic", period: 10 });

  const controller = new Component("Controller", "Controller");
  controller.addEndpoint("speed", "inbound");
  controller.addContract("SpeedIn", "publish-subscribe", ["speed"]).addDataField("kmh", "float");

  composition.addComponent(sensor);
  composition.addComponent(controller);
  return composition;
}

describe("Composition", () => {
  it("keeps components in insertion order", () => {
    const composition = buildPipeline();

    expect(composition.size).toBe(2);
    expect(composition.componentNames()).toEqual(["Sensor", "Controller"]);
    expect(composition.component("Controller")?.type).toBe("Controller");
    expect(composition.component("Actuator")).toBeUndefined();
  });

  it("rejects a second component with the same name and leaves the size unchanged", () => {
    const composition = buildPipeline();

    expect(() => composition.addComponent(new Component("Sensor", "Camera"))).toThrow(
      new DuplicateNameError("component", "Sensor", "Pipeline").message,
    );
    expect(composition.size).toBe(2);
    expect(composition.component("Sensor")?.type).toBe("Sensor");
  });

  it("allows an empty composition", () => {
    const composition = new Composition("Empty");

    expect(composition.size).toBe(0);
    expect(composition.components).toEqual([]);
  });
});

describe("captureCompositionView", () => {
  it("copies the model into frozen plain data", () => {
    const composition = buildPipeline();
    const view = captureCompositionView(composition);

    expect(Object.isFrozen(view)).toBe(true);
    expect(Object.isFrozen(view.components)).toBe(true);
    expect(Object.isFrozen(view.components[1].contracts[0].endpoints)).toBe(true);
    expect(view.components[1].contracts[0]).toEqual({
      name: "SpeedIn",
      kind: "publish-subscribe",
      endpoints: [{ name: "speed", direction: "inbound" }],
      dataFields: [{ name: "kmh", type: "float" }],
    });
  });

  it("is not affected by later registrations on the live model", () => {
    const composition = buildPipeline();
    const view = captureCompositionView(composition);

    composition.component("Sensor")?.addEndpoint("rpm", "outbound");
    composition.addComponent(new Component("Actuator", "Actuator"));

    expect(view.components.map((component) => component.name)).toEqual(["Sensor", "Controller"]);
    expect(view.components[0].endpoints.map((endpoint) => endpoint.name)).toEqual(["speed"]);
  });

  it("shares endpoint objects between a component and its contracts", () => {
    const view = captureCompositionView(buildPipeline());
    const controller = view.components[1];

    expect(controller.contracts[0].endpoints[0]).toBe(controller.endpoints[0]);
  });
});
