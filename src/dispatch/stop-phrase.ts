export const DEFAULT_STOP_WORDS: readonly string[] = ['exit', 'quit'];

function escapeRegExp(word: string): string {
  return word.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Whole-word, case-insensitive matcher for any of `words`. */
export function createStopPhraseMatcher(words: readonly string[] = DEFAULT_STOP_WORDS): (transcript: string) => boolean {
  const pattern = new RegExp(`\\b(${words.map(escapeRegExp).join('|')})\\b`, 'i');
  return (transcript) => pattern.test(transcript);
}

export const isStopPhrase = createStopPhraseMatcher();
