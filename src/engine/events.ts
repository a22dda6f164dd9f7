/**
 * Lint Events
 *
 * Progress notifications for the embedding tool. Listeners run
 * synchronously, in registration order, on the engine's thread of control.
 */

import type { Context } from "../context/Context.js";
import { logger } from "../utils/logger.js";
import type { LintEngine } from "./LintEngine.js";

export enum EventType {
  STARTING = "starting",
  SCANNING_PROJECT = "scanning-project",
  SCANNING_LIBRARY_PROJECT = "scanning-library-project",
  SCANNING_FILE = "scanning-file",
  NEW_PHASE = "new-phase",
  COMPLETED = "completed",
  CANCELED = "canceled",
}

/** `context` is `null` for run-level events */
export type LintListener = (engine: LintEngine, type: EventType, context: Context | null) => void;

export class EventNotifier {
  private readonly listeners: LintListener[] = [];

  constructor(private readonly engine: LintEngine) {}

  add(listener: LintListener): void {
    this.listeners.push(listener);
  }

  remove(listener: LintListener): void {
    const index = this.listeners.indexOf(listener);
    if (index !== -1) {
      this.listeners.splice(index, 1);
    }
  }

  get size(): number {
    return this.listeners.length;
  }

  fire(type: EventType, context: Context | null = null): void {
    for (const listener of [...this.listeners]) {
      try {
        listener(this.engine, type, context);
      } catch (error) {
        logger.warn(`[EventNotifier] Listener failed on ${type}: ${error}`);
      }
    }
  }
}
