export const DEFAULT_TARGET_LANGUAGE = 'Spanish';

const INSTRUCTION_VERB = /\b(?:please\s+)?(?:translate|convert)\b/i;
const TARGET = /\b(?:in)?to\s+([a-z]+)\b/gi;
/** "translate to French Hello", "translate this into German" */
const LEADING_TARGET = /^\s*(?:this\s+)?(?:text\s+)?(?:in)?to\s+([a-z]+)\b/i;
/** "translate good night into Italian" */
const TRAILING_TARGET = /\s*\b(?:in)?to\s+([a-z]+)\s*[.!?]?\s*$/i;
/** Words that only point at the text, with no text of their own. */
const FILLER = /^(?:this|text|this text|the following|the following text)$/i;

export interface TranslationInstruction {
  language: string;
  /** Query with the instruction removed. Empty when the instruction is all there is. */
  text: string;
}

/**
 * Pull the target language out of a free-text translation request.
 * Falls back to {@link DEFAULT_TARGET_LANGUAGE} when none is named.
 *
 * The instruction runs from "translate"/"convert" to the first colon or
 * line break; the language is the last "to X"/"into X" inside it, so
 * `Translate "I want to eat" into German` targets German.
 */
export function extractTargetLanguage(query: string): TranslationInstruction {
  const verb = INSTRUCTION_VERB.exec(query);
  if (!verb) {
    return { language: DEFAULT_TARGET_LANGUAGE, text: query.trim() };
  }

  const before = query.slice(0, verb.index);
  const after = query.slice(verb.index + verb[0].length);

  const colon = after.search(/[:\n]/);
  if (colon !== -1) {
    const name = lastTarget(after.slice(0, colon));
    return instruction(name, before, after.slice(colon + 1));
  }

  const leading = LEADING_TARGET.exec(after);
  if (leading) {
    return instruction(leading[1], before, after.slice(leading[0].length));
  }

  const trailing = TRAILING_TARGET.exec(after);
  if (trailing) {
    return instruction(trailing[1], before, after.slice(0, trailing.index));
  }

  // A bare verb names no language; only treat it as an instruction when nothing else is left.
  const bare = instruction(undefined, before, after);
  return bare.text === '' ? bare : { language: DEFAULT_TARGET_LANGUAGE, text: query.trim() };
}

function lastTarget(segment: string): string | undefined {
  let name: string | undefined;
  for (const match of segment.matchAll(TARGET)) {
    name = match[1];
  }
  return name;
}

function instruction(name: string | undefined, before: string, rest: string): TranslationInstruction {
  let text = `${before.trim()} ${rest.trim()}`.trim();
  if (FILLER.test(text)) text = '';
  return {
    language: name ? capitalize(name) : DEFAULT_TARGET_LANGUAGE,
    text,
  };
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}
