// ============================================================================
// RENDERED DOCUMENT — what the browser-automation collaborator must provide
// ============================================================================

import type { ElementLocator } from "./locator";

/** Values that survive the trip into and out of the document context. */
export type Serializable =
  | string
  | number
  | boolean
  | null
  | Serializable[]
  | { [key: string]: Serializable };

/**
 * A live rendered document. Everything that crosses into the document's own
 * execution context goes through `executeInContext` as plain data.
 */
export interface RenderedDocument<TElement> {
  /** Resolve a locator to an element, or `null` if nothing matches. */
  resolve(locator: ElementLocator): Promise<TElement | null>;
  /** Current visible text of the element, or `null` once it has left the document. */
  readText(element: TElement): Promise<string | null>;
  /**
   * Run `script` (the source of a function expression) inside the document with
   * `args` spread as its parameters. Resolves to the function's serialized result.
   */
  executeInContext(script: string, args: readonly Serializable[]): Promise<unknown>;
}

/** The part of a document the stream detector reads. */
export type ElementReader<TElement> = Pick<RenderedDocument<TElement>, "resolve" | "readText">;

/** The part of a document the mutation channel talks to. */
export type ScriptExecutor = Pick<RenderedDocument<unknown>, "executeInContext">;
