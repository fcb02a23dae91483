/**
 * Output sink for command results. stdout carries definitions; stderr carries errors.
 */

export interface Output {
  out(text: string): void;
  err(text: string): void;
}

export const consoleOutput: Output = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
};
