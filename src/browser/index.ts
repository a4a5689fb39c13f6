export type {
  RenderedDocument,
  ElementReader,
  ScriptExecutor,
  Serializable,
} from "./types";

export type { ElementLocator, LocatorStrategy } from "./locator";
export {
  By,
  LOCATOR_STRATEGIES,
  elementLocatorSchema,
  describeLocator,
  parseLocator,
  toPlaywrightSelector,
} from "./locator";

export { buildInvocation } from "./invocation";

export type { PlaywrightElement } from "./playwright-document";
export { PlaywrightDocument, isDetachedError } from "./playwright-document";
