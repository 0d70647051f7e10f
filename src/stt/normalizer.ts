/**
 * Canonical form for transcribed speech.
 *
 * Applied to spoken commands only; action values (paths, URLs) keep their
 * original spelling.
 */

// Apostrophe-less spellings, since STT output often drops the apostrophe.
const CONTRACTIONS: ReadonlyMap<string, string> = new Map([
  ["whats", "what is"],
  ["wheres", "where is"],
  ["hows", "how is"],
  ["whos", "who is"],
  ["thats", "that is"],
  ["theres", "there is"],
  ["im", "i am"],
  ["ive", "i have"],
  ["youre", "you are"],
  ["youve", "you have"],
  ["theyre", "they are"],
  ["dont", "do not"],
  ["doesnt", "does not"],
  ["didnt", "did not"],
  ["cant", "can not"],
  ["wont", "will not"],
  ["isnt", "is not"],
  ["arent", "are not"],
  ["wasnt", "was not"],
  ["couldnt", "could not"],
  ["shouldnt", "should not"],
  ["wouldnt", "would not"],
]);

const APOSTROPHES = /['’]/g;
const NON_WORD_CHAR = /[^\p{L}\p{M}\p{N}\s]/gu;
const WORD_CHAR = /[\p{L}\p{M}\p{N}]/u;
// Kept between two word characters: notepad.exe, e-mail, and/or
const INTERNAL_CHARS = new Set([".", "-", "_", "/", "\\", ":"]);

function isWordChar(char: string | undefined): boolean {
  return char !== undefined && WORD_CHAR.test(char);
}

function stripPunctuation(text: string): string {
  return text.replace(NON_WORD_CHAR, (char: string, offset: number, whole: string) => {
    const internal =
      INTERNAL_CHARS.has(char) &&
      isWordChar(whole[offset - 1]) &&
      isWordChar(whole[offset + 1]);
    return internal ? char : " ";
  });
}

function expandContractions(text: string): string {
  return text
    .split(" ")
    .map((word) => CONTRACTIONS.get(word) ?? word)
    .join(" ");
}

export function normalize(text: string): string {
  if (!text) return "";

  // NFC so a decomposed "é" compares equal to the precomposed one.
  const lowered = text.normalize("NFC").toLowerCase().replace(APOSTROPHES, "");
  const spaced = stripPunctuation(lowered).replaceAll(/\s+/g, " ").trim();
  return expandContractions(spaced);
}
