import pc from "picocolors";
import type { MetricDefinitions } from "../lib/cvss";

export type Colors = ReturnType<typeof pc.createColors>;

/**
 * Format resolved metrics for the terminal, one line per metric:
 *
 *   AV -> Network (N): The attacker can remotely exploit the vulnerability.
 *
 * The output is framed by an empty line on each side.
 */
export function renderExplanation(definitions: MetricDefinitions, colors: Colors = pc): string[] {
  const lines = Object.values(definitions).map((definition) => {
    const identifier = colors.bold(colors.red(definition.identifier));
    const label = colors.bold(colors.yellow(definition.label));
    const code = colors.yellow(`(${definition.code}):`);
    return `${identifier} -> ${label} ${code} ${definition.description}`;
  });

  return ["", ...lines, ""];
}
