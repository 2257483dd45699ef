/** Sink for player-facing text. Each call is one block of lines. */
export type Writer = (text: string) => void;

/** Writes to stdout through console.log */
export const consoleWriter: Writer = (text) => {
  console.log(text);
};
