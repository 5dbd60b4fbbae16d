// Kinds of failure the interpreter reports
export enum ErrorKind {
  UnboundSymbol = "UnboundSymbol",
  NotAProcedure = "NotAProcedure",
  WrongArgumentCount = "WrongArgumentCount",
  WrongArgumentType = "WrongArgumentType",
  FileNotFound = "FileNotFound",
}

// Reported to the host, never thrown through the evaluator
export class LispError extends Error {
  constructor(
    public readonly kind: ErrorKind,
    message: string,
  ) {
    super(message);
    this.name = "LispError";
  }
}

export interface Host {
  // Program output: display and REPL results
  print(text: string): void;
  // Diagnostic channel
  report(error: LispError): void;
}

export const consoleHost: Host = {
  print(text: string): void {
    console.log(text);
  },
  report(error: LispError): void {
    console.error(error.message);
  },
};
