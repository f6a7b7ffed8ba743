import { describe, expect, it } from "vitest";

import { Component } from "./component.js";
import { Composition } from "./composition.js";
import { renderComposition } from "./render.js";

describe("renderComposition", () => {
  it("renders an empty composition", () => {
    expect(renderComposition(new Composition("Nothing"))).toBe("Composition: Nothing\n  (none)");
  });

  it("renders every section of each component", () => {
    const composition = new Composition("Plant");

    const controller = new Component("Controller", "ECU");
    controller.addEndpoint("speed", "inbound");
    controller.addEndpoint("torque", "outbound");
    controller.addBehavioralUnit("tick", { trigger: "periodic", period: 10 });
    controller.addBehavioralUnit("onStop", { trigger: "event-driven" });
    const drive = controller.addContract("Drive", "publish-subscribe", ["speed", "torque"]);
    drive.addDataField("rpm", "uint16");
    controller.addContract("Diag", "client-server");

    composition.addComponent(controller);
    composition.addComponent(new Component("Idle", "Service"));

    expect(renderComposition(composition).split("\n")).toEqual([
      "Composition: Plant",
      "  Component 1: Controller (type: ECU)",
      "    Ports:",
      "      - speed (inbound)",
      "      - torque (outbound)",
      "    Runnables:",
      "      - tick (trigger: periodic, period: 10 ms)",
      "      - onStop (trigger: event-driven, period: n/a)",
      "    Interfaces:",
      "      - Drive (publish-subscribe; ports: speed, torque)",
      "        - rpm : uint16",
      "      - Diag (client-server; ports: (none))",
      "  Component 2: Idle (type: Service)",
      "    Ports:",
      "      (none)",
      "    Runnables:",
      "      (none)",
      "    Interfaces:",
      "      (none)",
    ]);
  });
});
