// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@phoenix/llm/normalize/extract-text`
 * Purpose: Best-effort text extraction from whatever an LLM client returns.
 * Scope: Pure, synchronous shape dispatch over unknown values. Does not strip fences (see normalize-result.ts).
 * Invariants:
 *   - Total: never throws; any failing probe counts as "no match" and the next probe runs
 *   - Probe order is fixed; the first matching shape wins
 *   - Empty parts are dropped before newline joins
 *   - Generic mappings serialize as compact JSON with keys sorted, values pre-flattened to text
 *   - A value that contains itself, or nesting beyond MAX_DEPTH, yields "" for that branch
 * Side-effects: none
 * Links: src/normalize/normalize-result.ts
 * @public
 */

const MAX_DEPTH = 64;

type Visit = (child: unknown) => string;

/** Returns extracted text, or `undefined` when the value does not have this probe's shape. */
type Probe = (value: unknown, visit: Visit) => string | undefined;

interface Field {
  value: unknown;
}

type Mapping = Map<unknown, unknown> | Record<string, unknown>;

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/** Dict-like: plain object literal, null-prototype object or Map. */
function isMapping(value: unknown): value is Mapping {
  return value instanceof Map || isPlainRecord(value);
}

/** Class instance or other non-mapping, non-array object (e.g. LangChain messages). */
function isRichObject(value: unknown): value is object {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !isMapping(value)
  );
}

/** Field or key lookup; `undefined` when absent. Throwing getters surface to the probe guard. */
function readField(source: unknown, key: string): Field | undefined {
  if (typeof source !== "object" || source === null) return undefined;
  if (source instanceof Map) {
    return source.has(key) ? { value: source.get(key) } : undefined;
  }
  if (!(key in source)) return undefined;
  return { value: Reflect.get(source, key) };
}

function attempt(probe: () => string | undefined): string | undefined {
  try {
    return probe();
  } catch {
    return undefined;
  }
}

function joinParts(parts: readonly string[]): string {
  return parts.filter((part) => part !== "").join("\n");
}

/** message, else text, else the choice itself. */
function extractChoice(choice: unknown, visit: Visit): string {
  const field = readField(choice, "message") ?? readField(choice, "text");
  return visit(field ? field.value : choice);
}

/** text, else content, else the element itself. */
function extractGeneration(element: unknown, visit: Visit): string {
  const field = readField(element, "text") ?? readField(element, "content");
  return visit(field ? field.value : element);
}

function delegateField(key: string, accepts: (value: unknown) => boolean): Probe {
  return (value, visit) => {
    if (!accepts(value)) return undefined;
    const field = readField(value, key);
    return field ? visit(field.value) : undefined;
  };
}

function choiceList(accepts: (value: unknown) => boolean): Probe {
  return (value, visit) => {
    if (!accepts(value)) return undefined;
    const choices = readField(value, "choices")?.value;
    if (!Array.isArray(choices)) return undefined;
    return joinParts(choices.map((choice: unknown) => extractChoice(choice, visit)));
  };
}

const generationBatch: Probe = (value, visit) => {
  if (!isRichObject(value)) return undefined;
  const generations = readField(value, "generations")?.value;
  if (!Array.isArray(generations)) return undefined;
  const elements = generations.flatMap((batch: unknown) =>
    Array.isArray(batch) ? batch : [batch]
  );
  return joinParts(elements.map((element: unknown) => extractGeneration(element, visit)));
};

function mappingEntries(mapping: Mapping): Array<[string, unknown]> {
  if (mapping instanceof Map) {
    return [...mapping.entries()].map(
      ([key, entry]): [string, unknown] => [String(key), entry]
    );
  }
  return Object.keys(mapping).map((key): [string, unknown] => [key, mapping[key]]);
}

const genericMapping: Probe = (value, visit) => {
  if (!isMapping(value)) return undefined;
  const flattened = new Map<string, string>();
  for (const [key, entry] of mappingEntries(value)) {
    flattened.set(key, visit(entry));
  }
  const body = [...flattened.keys()]
    .sort()
    .map((key) => `${JSON.stringify(key)}:${JSON.stringify(flattened.get(key) ?? "")}`)
    .join(",");
  return `{${body}}`;
};

const sequence: Probe = (value, visit) => {
  if (!Array.isArray(value)) return undefined;
  return joinParts(value.map((element: unknown) => visit(element)));
};

/** Objects exposing `toJSON()` that yields a mapping; nullish fields are dropped. */
const structuredDump: Probe = (value, visit) => {
  if (!isRichObject(value)) return undefined;
  const toJSON = readField(value, "toJSON")?.value;
  if (typeof toJSON !== "function") return undefined;
  const dumped: unknown = Reflect.apply(toJSON, value, []);
  if (!isMapping(dumped)) return undefined;
  const cleaned = new Map<string, unknown>();
  for (const [key, entry] of mappingEntries(dumped)) {
    if (entry !== null && entry !== undefined) cleaned.set(key, entry);
  }
  return visit(cleaned);
};

// Functions would render their source text.
const opaque: Probe = (value) => (typeof value === "function" ? "" : String(value));

const PROBES: readonly Probe[] = [
  delegateField("content", isRichObject),
  delegateField("text", isRichObject),
  choiceList(isRichObject),
  generationBatch,
  delegateField("content", isMapping),
  choiceList(isMapping),
  delegateField("message", isMapping),
  genericMapping,
  sequence,
  structuredDump,
  opaque,
];

function extractAt(value: unknown, depth: number, ancestors: Set<object>): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "string") return value;
  if (
    typeof value === "number" ||
    typeof value === "bigint" ||
    typeof value === "boolean"
  ) {
    return String(value);
  }
  if (depth > MAX_DEPTH) return "";

  const container = typeof value === "object" ? value : undefined;
  if (container) {
    if (ancestors.has(container)) return "";
    ancestors.add(container);
  }

  const visit: Visit = (child) => extractAt(child, depth + 1, ancestors);
  try {
    for (const probe of PROBES) {
      const text = attempt(() => probe(value, visit));
      if (text !== undefined) return text;
    }
    return "";
  } finally {
    if (container) ancestors.delete(container);
  }
}

/**
 * Convert an LLM response of unknown shape into text.
 *
 * Recognized shapes, in priority order: absent, string, scalar, object with
 * `content`, `text`, `choices` or `generations`, mapping with `content`,
 * `choices` or `message`, any other mapping, array, object with a mapping
 * `toJSON()`, then `String(value)` (`""` for functions).
 */
export function extractText(value: unknown): string {
  return extractAt(value, 0, new Set());
}
