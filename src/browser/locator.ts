// ============================================================================
// LOCATORS — caller-supplied references to a single element
// ============================================================================

import { z } from "zod";

export const LOCATOR_STRATEGIES = [
  "css",
  "xpath",
  "id",
  "name",
  "className",
  "tagName",
  "testId",
] as const;

export const elementLocatorSchema = z.object({
  strategy: z.enum(LOCATOR_STRATEGIES),
  value: z.string().min(1, "locator value must not be empty"),
});

export type ElementLocator = z.infer<typeof elementLocatorSchema>;
export type LocatorStrategy = ElementLocator["strategy"];

/** Locator builders, one per strategy. */
export const By = {
  css: (value: string): ElementLocator => ({ strategy: "css", value }),
  xpath: (value: string): ElementLocator => ({ strategy: "xpath", value }),
  id: (value: string): ElementLocator => ({ strategy: "id", value }),
  name: (value: string): ElementLocator => ({ strategy: "name", value }),
  className: (value: string): ElementLocator => ({ strategy: "className", value }),
  tagName: (value: string): ElementLocator => ({ strategy: "tagName", value }),
  testId: (value: string): ElementLocator => ({ strategy: "testId", value }),
};

/** `strategy=value`, used in log lines and error messages. */
export function describeLocator(locator: ElementLocator): string {
  return `${locator.strategy}=${locator.value}`;
}

/** Validate a locator before it is used or sent across the document boundary. */
export function parseLocator(locator: ElementLocator): ElementLocator {
  const result = elementLocatorSchema.safeParse(locator);
  if (!result.success) {
    throw new TypeError(`Invalid locator: ${result.error.issues.map(i => i.message).join("; ")}`);
  }
  return result.data;
}

/** Map a locator onto Playwright's selector engines. */
export function toPlaywrightSelector(locator: ElementLocator): string {
  const { strategy, value } = locator;
  switch (strategy) {
    case "css":
    case "tagName":
      return `css=${value}`;
    case "xpath":
      return `xpath=${value}`;
    case "id":
      return `id=${value}`;
    case "testId":
      return `data-testid=${value}`;
    case "name":
      return `css=[name="${value.replace(/(["\\])/g, "\\$1")}"]`;
    case "className":
      return `css=.${value.trim().split(/\s+/).join(".")}`;
  }
}
