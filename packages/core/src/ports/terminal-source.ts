/** Supplies the current terminal content; the engine never reads on its own. */
export interface ITerminalSource {
  read(): string | Promise<string>;
}
