// guard/normalize.ts
// Text normalization shared by fingerprints and combo keys

import vocabulary from "./vocabulary.json";

const TITLE_STOPWORDS = new Set<string>(vocabulary.titleStopwords);
const INVARIANT_WORDS = new Set<string>(vocabulary.invariantWords);
const IRREGULAR_PLURALS = new Map<string, string>(Object.entries(vocabulary.irregularPlurals));
const TECHNIQUE_BUCKETS: Array<[string, Set<string>]> = Object.entries(vocabulary.techniqueBuckets)
  .map(([label, words]): [string, Set<string>] => [label, new Set(words)]);

const WORD = /[a-z0-9]+(?:-[a-z0-9]+)*/g;

/** Lowercase and drop diacritics so "Sauté" and "saute" compare equal. */
export function foldCase(text: string): string {
  return text
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase();
}

/** Collapse a plural food word to its singular form. Unknown shapes pass through. */
export function singularize(word: string): string {
  if (word.length <= 3 || INVARIANT_WORDS.has(word)) return word;

  const irregular = IRREGULAR_PLURALS.get(word);
  if (irregular) return irregular;

  if (word.endsWith("ies")) return word.slice(0, -3) + "y";
  if (word.endsWith("oes")) return word.slice(0, -2);
  if (/(ches|shes|sses|xes|zes)$/.test(word)) return word.slice(0, -2);
  if (word.endsWith("s") && !/(ss|us|is)$/.test(word)) return word.slice(0, -1);
  return word;
}

/**
 * Normalize an ingredient name: case-fold, drop parentheticals, quantities and
 * punctuation, then singularize each word. "2 Cherry Tomatoes (halved)" → "cherry tomato".
 */
export function normalizeIngredient(name: string): string {
  const words = foldCase(name)
    .replace(/\([^)]*\)/g, " ")
    .replace(/[^a-z0-9\s]/g, " ")
    .split(/\s+/)
    .filter((w) => w && !/^\d+$/.test(w));
  return words.map(singularize).join(" ");
}

/** Sorted, de-duplicated set of normalized ingredient names. Blank names are dropped. */
export function normalizeIngredientSet(names: readonly string[]): string[] {
  const set = new Set<string>();
  for (const name of names) {
    const normalized = normalizeIngredient(name);
    if (normalized) set.add(normalized);
  }
  return [...set].sort();
}

export function normalizeTag(tag: string): string {
  return foldCase(tag).trim().replace(/[^a-z0-9]+/g, "_").replace(/^_+|_+$/g, "");
}

/** Folded title with runs of whitespace collapsed. */
export function normalizeTitle(title: string): string {
  return foldCase(title).trim().replace(/\s+/g, " ");
}

/** Lowercase words of a title, keeping hyphenated compounds whole. */
export function titleWords(title: string): string[] {
  return foldCase(title).match(WORD) ?? [];
}

/** Title words minus filler ("easy", "the", ...), split on hyphens. */
export function titleTokens(title: string): string[] {
  const tokens = titleWords(title).flatMap((w) => w.split("-"));
  return tokens.filter((t) => !TITLE_STOPWORDS.has(t));
}

/** Cooking-technique labels implied by a title: "Grilled Chicken Tacos" → ["grill", "wrap"]. */
export function techniqueLabels(title: string): string[] {
  const words = new Set(titleWords(title));
  const labels: string[] = [];
  for (const [label, keys] of TECHNIQUE_BUCKETS) {
    for (const word of words) {
      if (keys.has(word)) {
        labels.push(label);
        break;
      }
    }
  }
  return labels;
}

/** Canonical key for a requested ingredient combination. Order and plurals do not matter. */
export function comboKeyOf(ingredients: readonly string[]): string {
  return normalizeIngredientSet(ingredients).join("+");
}

/** Avoid-list bucket for one user and one ingredient combination. */
export function historyKey(userId: string, comboKey: string): string {
  return `${userId}::${comboKey}`;
}
