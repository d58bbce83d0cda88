import type { Language } from "./types";

const DEVANAGARI = /[\u0900-\u097F]/g;

/** "hindi" when more than 30% of the characters are Devanagari. */
export function detectLanguage(text: string): Language {
  const devanagari = text.match(DEVANAGARI)?.length ?? 0;
  return devanagari > text.length * 0.3 ? "hindi" : "english";
}

/** Accepts loose spellings from tool callers ("hi", "Hindi", "en", ...). */
export function parseLanguage(value: string | undefined, fallbackText = ""): Language {
  const v = value?.trim().toLowerCase();
  if (v === "hindi" || v === "hi") return "hindi";
  if (v === "english" || v === "en") return "english";
  return detectLanguage(fallbackText);
}
