/**
 * SoulDOS HAL — Diagnostic Sink Interface
 *
 * Defines the injection point for HAL diagnostic output.
 *
 * The HAL owns the contract (this interface) and never writes to a stream
 * itself. The shell layer provides a concrete sink at construction time;
 * when no sink is injected the diagnostics are dropped.
 */

import type { HalOperation } from '../types/hal.js';

/** A single diagnostic line produced by a HAL implementation. */
export interface HalDiagnostic {
  /** Name of the implementation that produced the line, e.g. `MockHAL`. */
  readonly source: string;
  /** The HAL operation in progress. */
  readonly operation: HalOperation;
  readonly message: string;
}

/**
 * A sink that receives HAL diagnostics in the order they are produced.
 *
 * append() is synchronous: a diagnostic is delivered before the HAL call
 * that produced it returns.
 */
export interface DiagnosticSink {
  append(entry: HalDiagnostic): void;
}

/**
 * In-memory sink for tests and embedded use.
 */
export class MemoryDiagnosticSink implements DiagnosticSink {
  private readonly _entries: HalDiagnostic[] = [];

  append(entry: HalDiagnostic): void {
    this._entries.push(entry);
  }

  get entries(): ReadonlyArray<HalDiagnostic> {
    return this._entries;
  }

  /** Messages only, in order. */
  messages(): string[] {
    return this._entries.map((e) => e.message);
  }

  clear(): void {
    this._entries.length = 0;
  }
}
