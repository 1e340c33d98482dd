import { LanguagePreset } from "./types";

// Entries keep the leading space the recognizer puts in front of every word.
export const LANGUAGE_PRESETS: Readonly<Record<string, LanguagePreset>> = {
  de: {
    abbreviations: [" z.B.", " u.a.", " d.h.", " bzw.", " etc.", " usw.", " z. B.", " u. a.", " d. h."],
    conjunctions: [" oder", " und", " sowie", " als auch", " sondern", " aber", " denn", " doch", " bzw."]
  },
  en: {
    abbreviations: [" e.g.", " i.e.", " etc.", " vs.", " Mr.", " Mrs.", " Dr.", " e. g.", " i. e."],
    conjunctions: [" and", " or", " but", " nor", " yet", " so", " as well as"]
  }
};

export const DEFAULT_LANGUAGE = "de";

export function languagePreset(language: string): LanguagePreset | undefined {
  return Object.prototype.hasOwnProperty.call(LANGUAGE_PRESETS, language)
    ? LANGUAGE_PRESETS[language]
    : undefined;
}
