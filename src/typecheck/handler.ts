import type { TypeCheckError } from "./types";

export type DiagnosticSink = (error: TypeCheckError) => void;

/**
 * Collects type-checking errors. Emitting never interrupts the pass; callers
 * read the batch once checking is over.
 */
export class Handler {
  private readonly emitted: TypeCheckError[] = [];

  constructor(private readonly sink?: DiagnosticSink) {}

  emitErr(error: TypeCheckError): void {
    this.emitted.push(error);
    this.sink?.(error);
  }

  get errors(): readonly TypeCheckError[] {
    return this.emitted;
  }

  get errCount(): number {
    return this.emitted.length;
  }

  hadErrors(): boolean {
    return this.emitted.length > 0;
  }
}
