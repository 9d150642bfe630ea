import type { ErrorKind } from "../errors.js";

/** Compile event types */
export type CompileEvent =
  | DocumentLexedEvent
  | DocumentParsedEvent
  | DocumentCompiledEvent
  | StylesheetAppliedEvent
  | CompileFailedEvent;

export interface DocumentLexedEvent {
  type: "document_lexed";
  file: string;
  tokenCount: number;
  timestamp: string;
}

export interface DocumentParsedEvent {
  type: "document_parsed";
  file: string;
  nodeCount: number;
  timestamp: string;
}

export interface DocumentCompiledEvent {
  type: "document_compiled";
  file: string;
  contentCount: number;
  includeCount: number;
  timestamp: string;
}

export interface StylesheetAppliedEvent {
  type: "stylesheet_applied";
  file: string;
  ruleCount: number;
  timestamp: string;
}

export interface CompileFailedEvent {
  type: "compile_failed";
  file: string;
  kind: ErrorKind;
  error: string;
  timestamp: string;
}

/** Event listener type */
export type EventListener = (event: CompileEvent) => void;

/** Simple event emitter for compile events */
export class EventEmitter {
  private listeners: EventListener[] = [];

  on(listener: EventListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  emit(event: CompileEvent): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }
}
