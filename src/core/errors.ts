export const EMPTY_INPUT_WARNING = "Please paste text to analyze.";

/** Raised before any model call when the input is empty or only whitespace. */
export class EmptyInputError extends Error {
  constructor() {
    super(EMPTY_INPUT_WARNING);
    this.name = "EmptyInputError";
  }
}
