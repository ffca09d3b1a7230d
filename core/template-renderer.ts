import type { EndpointDescriptor } from "../types/config";
import { isJsonObject } from "../types/json";
import type { JsonObject, JsonValue } from "../types/json";

export type TemplateBinding = string | number | boolean | null | undefined;
export type TemplateBindings = Readonly<Record<string, TemplateBinding>>;

const PLACEHOLDER = /\{([a-zA-Z0-9_]+)\}/g;
const UNRESOLVED = /\{[a-zA-Z0-9_]+\}/;

/**
 * Substitutes `{name}` placeholders in a string. Returns undefined when a
 * placeholder is unbound or bound to null, or when a bound value brings in
 * placeholder text of its own: a half-filled value is never sent.
 */
function renderString(value: string, bindings: TemplateBindings): string | undefined {
  let dropped = false;
  const rendered = value.replace(PLACEHOLDER, (match, name: string) => {
    const replacement = Object.prototype.hasOwnProperty.call(bindings, name)
      ? bindings[name]
      : undefined;
    if (replacement === undefined || replacement === null) {
      dropped = true;
      return match;
    }
    return String(replacement);
  });
  return dropped || UNRESOLVED.test(rendered) ? undefined : rendered;
}

/**
 * Renders a variables template. Dropped strings disappear from their
 * parent mapping or sequence instead of turning into null.
 */
export function renderTemplate(value: JsonValue, bindings: TemplateBindings): JsonValue | undefined {
  if (typeof value === "string") {
    return renderString(value, bindings);
  }

  if (Array.isArray(value)) {
    const items: JsonValue[] = [];
    for (const item of value) {
      const rendered = renderTemplate(item, bindings);
      if (rendered !== undefined) {
        items.push(rendered);
      }
    }
    return items;
  }

  if (isJsonObject(value)) {
    return renderObject(value, bindings);
  }

  return value;
}

export function renderObject(template: JsonObject, bindings: TemplateBindings): JsonObject {
  const rendered: JsonObject = {};
  for (const [key, item] of Object.entries(template)) {
    const value = renderTemplate(item, bindings);
    if (value !== undefined) {
      rendered[key] = value;
    }
  }
  return rendered;
}

/**
 * Renders an endpoint's variables and applies the configured page size to
 * a `first` variable when the template declares one.
 */
export function renderEndpointVariables(
  endpoint: Pick<EndpointDescriptor, "variables">,
  bindings: TemplateBindings,
  pageSize?: number
): JsonObject {
  const variables = renderObject(endpoint.variables, bindings);
  if ("first" in variables && pageSize) {
    variables.first = pageSize;
  }
  return variables;
}
