/**
 * Engine Configuration
 *
 * Options accepted by `new LintEngine(...)`, validated with zod.
 */

import { z } from "zod";

/** Upper bound on analysis passes per project */
export const MAX_PHASES = 3;

export const EngineOptionsSchema = z
  .object({
    assertions: z
      .boolean()
      .optional()
      .describe("Run development-only consistency checks (registry and project model)"),
  })
  .strict();

export type EngineOptionsInput = z.input<typeof EngineOptionsSchema>;

export interface EngineOptions {
  assertions: boolean;
}

function assertionsFromEnvironment(): boolean {
  return process.env["LINT_ASSERTIONS"] === "1" || process.env["NODE_ENV"] === "test";
}

/**
 * Validate engine options and fill in defaults. Assertions default to on
 * under `LINT_ASSERTIONS=1` or `NODE_ENV=test`.
 *
 * @throws z.ZodError on unknown or mistyped options
 */
export function resolveEngineOptions(input: EngineOptionsInput = {}): EngineOptions {
  const parsed = EngineOptionsSchema.parse(input);
  return {
    assertions: parsed.assertions ?? assertionsFromEnvironment(),
  };
}
