import type { ComponentView, CompositionView } from "./schema.js";

const INDENT = "  ";
const NONE = "(none)";

export function renderComposition(composition: CompositionView): string {
  const lines = [`Composition: ${composition.name}`];

  if (composition.components.length === 0) {
    lines.push(`${INDENT}${NONE}`);
  }

  composition.components.forEach((component, index) => {
    lines.push(...renderComponent(component, index + 1));
  });

  return lines.join("\n");
}

function renderComponent(component: ComponentView, position: number): string[] {
  const pad = INDENT.repeat(2);
  const item = INDENT.repeat(3);
  const lines = [`${INDENT}Component ${position}: ${component.name} (type: ${component.type})`];

  lines.push(`${pad}Ports:`);
  if (component.endpoints.length === 0) lines.push(`${item}${NONE}`);
  for (const endpoint of component.endpoints) {
    lines.push(`${item}- ${endpoint.name} (${endpoint.direction})`);
  }

  lines.push(`${pad}Runnables:`);
  if (component.behavioralUnits.length === 0) lines.push(`${item}${NONE}`);
  for (const unit of component.behavioralUnits) {
    const period = unit.period === null ? "n/a" : `${unit.period} ms`;
    lines.push(`${item}- ${unit.name} (trigger: ${unit.trigger}, period: ${period})`);
  }

  lines.push(`${pad}Interfaces:`);
  if (component.contracts.length === 0) lines.push(`${item}${NONE}`);
  for (const contract of component.contracts) {
    const ports = contract.endpoints.map((endpoint) => endpoint.name).join(", ") || NONE;
    lines.push(`${item}- ${contract.name} (${contract.kind}; ports: ${ports})`);
    for (const field of contract.dataFields) {
      lines.push(`${item}${INDENT}- ${field.name} : ${field.type}`);
    }
  }

  return lines;
}
