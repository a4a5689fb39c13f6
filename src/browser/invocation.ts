import type { Serializable } from "./types";

/**
 * Build the expression evaluated inside the document: the script applied to its
 * JSON-encoded arguments.
 */
export function buildInvocation(script: string, args: readonly Serializable[]): string {
  return `(${script.trim()}).apply(null, ${JSON.stringify(args)})`;
}
