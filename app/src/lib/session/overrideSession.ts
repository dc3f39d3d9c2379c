import type { OverrideSet } from "../typing/types";

export type OverrideChoice = "auto" | "numeric" | "text";

export type OverrideSession = {
  fileName: string;
  forceNumeric: string[];
  forceText: string[];
};

export const createOverrideSession = (fileName: string): OverrideSession => ({
  fileName,
  forceNumeric: [],
  forceText: []
});

/**
 * Overrides belong to one uploaded file. A different file name starts over
 * with empty sets; the same name keeps what the operator chose.
 */
export const reconcileOverrideSession = (
  previous: OverrideSession | null | undefined,
  fileName: string
): OverrideSession => {
  if (previous && previous.fileName === fileName) {
    return previous;
  }
  return createOverrideSession(fileName);
};

const without = (values: string[], column: string): string[] =>
  values.filter((value) => value !== column);

export const setOverride = (
  session: OverrideSession,
  column: string,
  choice: OverrideChoice
): OverrideSession => {
  const forceNumeric = without(session.forceNumeric, column);
  const forceText = without(session.forceText, column);
  if (choice === "numeric") {
    forceNumeric.push(column);
  }
  if (choice === "text") {
    forceText.push(column);
  }
  return { ...session, forceNumeric, forceText };
};

export const overrideChoiceFor = (session: OverrideSession, column: string): OverrideChoice => {
  if (session.forceText.includes(column)) {
    return "text";
  }
  if (session.forceNumeric.includes(column)) {
    return "numeric";
  }
  return "auto";
};

export const toOverrideSet = (session: OverrideSession): OverrideSet => ({
  forceNumeric: [...session.forceNumeric],
  forceText: [...session.forceText]
});
