/**
 * Build events.
 *
 * The builder reports progress through typed events instead of writing to
 * the console; the CLI decides how to print them.
 */

import type { Direction } from "./direction.js";
import type { Diagnostic } from "./validator.js";

// ---------- Event Types ----------

export interface BuildStartedEvent {
  type: "BuildStarted";
  targetCount: number;
  timestamp: string;
}

export interface SourceLoadedEvent {
  type: "SourceLoaded";
  origin: string;
  fragmentCount: number;
  bytes: number;
  timestamp: string;
}

export interface DiagnosticReportedEvent {
  type: "DiagnosticReported";
  origin: string;
  diagnostic: Diagnostic;
  timestamp: string;
}

export interface StylesheetGeneratedEvent {
  type: "StylesheetGenerated";
  origin: string;
  direction: Direction;
  substitutions: number;
  timestamp: string;
}

export interface StylesheetWrittenEvent {
  type: "StylesheetWritten";
  direction: Direction;
  outputPath: string;
  bytes: number;
  unchanged: boolean;
  timestamp: string;
}

export interface DirectionFailedEvent {
  type: "DirectionFailed";
  direction: Direction;
  outputPath: string;
  error: string;
  timestamp: string;
}

export interface TargetFailedEvent {
  type: "TargetFailed";
  origin: string;
  error: string;
  timestamp: string;
}

export interface BuildCompletedEvent {
  type: "BuildCompleted";
  duration: number;
  written: number;
  unchanged: number;
  failed: number;
  timestamp: string;
}

export type BuildEvent =
  | BuildStartedEvent
  | SourceLoadedEvent
  | DiagnosticReportedEvent
  | StylesheetGeneratedEvent
  | StylesheetWrittenEvent
  | DirectionFailedEvent
  | TargetFailedEvent
  | BuildCompletedEvent;

export type EventListener = (event: BuildEvent) => void;

// ---------- Event Emitter ----------

export class BuildEventEmitter {
  private listeners: EventListener[] = [];

  /** Register an event listener. */
  on(listener: EventListener): void {
    this.listeners.push(listener);
  }

  /** Remove an event listener. */
  off(listener: EventListener): void {
    this.listeners = this.listeners.filter((l) => l !== listener);
  }

  /** Emit an event to all listeners. */
  emit(event: BuildEvent): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }

  /** Remove all listeners. */
  clear(): void {
    this.listeners = [];
  }

  emitBuildStarted(targetCount: number): void {
    this.emit({
      type: "BuildStarted",
      targetCount,
      timestamp: new Date().toISOString(),
    });
  }

  emitSourceLoaded(origin: string, fragmentCount: number, bytes: number): void {
    this.emit({
      type: "SourceLoaded",
      origin,
      fragmentCount,
      bytes,
      timestamp: new Date().toISOString(),
    });
  }

  emitDiagnosticReported(origin: string, diagnostic: Diagnostic): void {
    this.emit({
      type: "DiagnosticReported",
      origin,
      diagnostic,
      timestamp: new Date().toISOString(),
    });
  }

  emitStylesheetGenerated(
    origin: string,
    direction: Direction,
    substitutions: number,
  ): void {
    this.emit({
      type: "StylesheetGenerated",
      origin,
      direction,
      substitutions,
      timestamp: new Date().toISOString(),
    });
  }

  emitStylesheetWritten(
    direction: Direction,
    outputPath: string,
    bytes: number,
    unchanged: boolean,
  ): void {
    this.emit({
      type: "StylesheetWritten",
      direction,
      outputPath,
      bytes,
      unchanged,
      timestamp: new Date().toISOString(),
    });
  }

  emitDirectionFailed(direction: Direction, outputPath: string, error: string): void {
    this.emit({
      type: "DirectionFailed",
      direction,
      outputPath,
      error,
      timestamp: new Date().toISOString(),
    });
  }

  emitTargetFailed(origin: string, error: string): void {
    this.emit({
      type: "TargetFailed",
      origin,
      error,
      timestamp: new Date().toISOString(),
    });
  }

  emitBuildCompleted(
    duration: number,
    written: number,
    unchanged: number,
    failed: number,
  ): void {
    this.emit({
      type: "BuildCompleted",
      duration,
      written,
      unchanged,
      failed,
      timestamp: new Date().toISOString(),
    });
  }
}
