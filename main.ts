#!/usr/bin/env node
import { createInterface } from "readline";
import { Interpreter } from "./interpreter";
import { printValue } from "./printer";

const PROMPT = "scheme> ";
const CONTINUATION_PROMPT = "... ";

//
// Collects lines until the parentheses look balanced
//
export class InputBuffer {
  private text: string = "";
  private open: number = 0;
  private close: number = 0;

  // Returns true once the buffered text holds a complete expression
  append(line: string): boolean {
    this.text += line + "\n";
    for (const char of line) {
      if (char === "(") this.open++;
      else if (char === ")") this.close++;
    }
    return this.isComplete();
  }

  isComplete(): boolean {
    if (this.open === 0) return !this.isBlank();
    return this.close >= this.open;
  }

  isBlank(): boolean {
    return this.text.trim() === "";
  }

  take(): string {
    const text = this.text;
    this.text = "";
    this.open = 0;
    this.close = 0;
    return text;
  }
}

async function main(): Promise<void> {
  const interpreter = new Interpreter();

  for (const script of process.argv.slice(2)) {
    interpreter.load(script);
  }

  const lines = createInterface({ input: process.stdin });
  const buffer = new InputBuffer();

  console.log("tinylisp interpreter. Ctrl-D to exit.");
  process.stdout.write(PROMPT);

  try {
    for await (const line of lines) {
      if (!buffer.append(line)) {
        if (buffer.isBlank()) {
          buffer.take();
          process.stdout.write(PROMPT);
        } else {
          process.stdout.write(CONTINUATION_PROMPT);
        }
        continue;
      }
      const result = interpreter.evalString(buffer.take());
      console.log(printValue(result));
      process.stdout.write(PROMPT);
    }
  } finally {
    lines.close();
  }
}

if (require.main === module) {
  main().catch((error) => {
    console.error(error instanceof Error ? error.stack : error);
    process.exit(1);
  });
}
