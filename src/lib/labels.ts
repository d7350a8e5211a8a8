/**
 * Label identities of the unit-circle diagram and the fixed rules deciding
 * which label gives way when two of them overlap.
 */

export type TrigFunction = "sin" | "cos" | "tan" | "cot" | "sec" | "csc";

export type Label = TrigFunction | "theta" | "unit";

export const TRIG_FUNCTIONS: readonly TrigFunction[] = ["sin", "cos", "tan", "cot", "sec", "csc"];

export const ALL_LABELS: readonly Label[] = [...TRIG_FUNCTIONS, "theta", "unit"];

/**
 * Fade-trigger table: a label fades while it overlaps any label in its list.
 * The relation is directional; tan, cot and csc never fade.
 */
const FADE_TRIGGERS: Record<Label, readonly Label[]> = {
  sin: ["tan", "csc"],
  cos: ["sec"],
  tan: [],
  cot: [],
  sec: ["cot"],
  csc: [],
  theta: ["sin"],
  unit: ["cos", "sin", "csc"],
};

/** Labels whose opacity is animated. */
export const WATCHED_LABELS: readonly Label[] = ALL_LABELS.filter(
  (label) => FADE_TRIGGERS[label].length > 0
);

export function shouldFade(label: Label, other: Label): boolean {
  return FADE_TRIGGERS[label].includes(other);
}

export function isWatched(label: Label): boolean {
  return FADE_TRIGGERS[label].length > 0;
}

const LABEL_SET: ReadonlySet<string> = new Set(ALL_LABELS);
const TRIG_FUNCTION_SET: ReadonlySet<string> = new Set(TRIG_FUNCTIONS);

export function isLabel(value: string): value is Label {
  return LABEL_SET.has(value);
}

export function isTrigFunction(value: string): value is TrigFunction {
  return TRIG_FUNCTION_SET.has(value);
}

export function mapTrigFunctions<T>(fn: (trig: TrigFunction) => T): Record<TrigFunction, T> {
  return {
    sin: fn("sin"),
    cos: fn("cos"),
    tan: fn("tan"),
    cot: fn("cot"),
    sec: fn("sec"),
    csc: fn("csc"),
  };
}

export function mapLabels<T>(fn: (label: Label) => T): Record<Label, T> {
  return {
    ...mapTrigFunctions(fn),
    theta: fn("theta"),
    unit: fn("unit"),
  };
}

export const LABEL_TEXT: Record<Label, string> = {
  sin: "sin θ",
  cos: "cos θ",
  tan: "tan θ",
  cot: "cot θ",
  sec: "sec θ",
  csc: "csc θ",
  theta: "θ",
  unit: "1.0",
};
