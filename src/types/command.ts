/**
 * A structured command ready for execution.
 * Callers never build raw command strings: they produce Command objects.
 */
export interface Command {
  readonly argv: string[];
}
