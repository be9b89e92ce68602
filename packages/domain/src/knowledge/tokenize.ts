import stopwordList from "./stopwords.json";

const STOPWORDS: ReadonlySet<string> = new Set(stopwordList);
const MIN_TOKEN_LENGTH = 3;
// Crude stemming for an inflected language: "ordinacija" and "ordinacijo" share "ordina".
const STEM_LENGTH = 6;

export function normalizeText(text: string): string {
  return text
    .normalize("NFD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase();
}

export function tokenize(text: string): Set<string> {
  const tokens = new Set<string>();
  for (const word of normalizeText(text).split(/[^a-z0-9]+/)) {
    if (word.length < MIN_TOKEN_LENGTH || STOPWORDS.has(word)) continue;
    tokens.add(word.slice(0, STEM_LENGTH));
  }
  return tokens;
}
