/**
 * Output Port Interface
 *
 * Core logic writes reports through this interface instead of console.log,
 * so commands and tests can choose where the lines go.
 */

export interface OutputPort {
  /** Display a plain report line */
  message(message: string): void;
}
