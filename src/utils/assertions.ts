/**
 * Development-only consistency checks. They run only when the engine was
 * created with `assertions: true`; a failure means a registry or project
 * model bug, never bad user input.
 */

export class LintAssertionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LintAssertionError";
  }
}

export function lintAssert(enabled: boolean, condition: boolean, message: () => string): void {
  if (enabled && !condition) {
    throw new LintAssertionError(message());
  }
}
