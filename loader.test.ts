import assert from "assert";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { ErrorKind, Host, LispError } from "./errors";
import { Interpreter } from "./interpreter";
import { evalSource, loadFile } from "./loader";
import { printValue } from "./printer";

// Test utilities
const dir = mkdtempSync(join(tmpdir(), "tinylisp-"));

function script(name: string, source: string): string {
  const path = join(dir, name);
  writeFileSync(path, source);
  return path;
}

function session(): { interpreter: Interpreter; errors: LispError[] } {
  const errors: LispError[] = [];
  const host: Host = {
    print: () => {},
    report: (error) => errors.push(error),
  };
  return { interpreter: new Interpreter(host), errors };
}

// Test runner
let passed = 0;
let failed = 0;

async function test(name: string, fn: () => Promise<void>): Promise<void> {
  try {
    await fn();
    console.log(`✓ ${name}`);
    passed++;
  } catch (error) {
    console.log(`✗ ${name}`);
    console.error(`  ${error}`);
    failed++;
  }
}

// ============================================
// Tests
// ============================================

async function runTests(): Promise<void> {
  console.log("=== Loader Tests ===\n");

  const sequence = script("sequence.scm", "(define a 1)\n(+ a 1)\n");

  // --- Loading files ---

  console.log("--- Loading files ---");

  await test("returns the value of the last form", async () => {
    const { interpreter } = session();
    assert.strictEqual(interpreter.load(sequence), 2);
  });

  await test("definitions stay in the target frame", async () => {
    const { interpreter } = session();
    interpreter.load(sequence);
    assert.strictEqual(interpreter.global.lookup("a"), 1);
  });

  await test("load primitive takes a quoted symbol", async () => {
    const { interpreter, errors } = session();
    assert.strictEqual(interpreter.evalString(`(load (quote ${sequence}))`), 2);
    assert.strictEqual(interpreter.evalString("a"), 1);
    assert.deepStrictEqual(errors, []);
  });

  await test("multi-line forms", async () => {
    const path = script(
      "square.scm",
      "(define square\n  (lambda (n)\n    (* n n)))\n\n(square 12)\n",
    );
    const { interpreter } = session();
    assert.strictEqual(interpreter.load(path), 144);
  });

  await test("empty file yields the empty list", async () => {
    const { interpreter, errors } = session();
    assert.strictEqual(interpreter.load(script("empty.scm", "")), null);
    assert.deepStrictEqual(errors, []);
  });

  await test("file of definitions returns the last symbol", async () => {
    const path = script("defs.scm", "(define p 1) (define q 2)");
    const { interpreter } = session();
    assert.strictEqual(printValue(interpreter.load(path)), "q");
  });

  await test("load inside a closure binds in the call frame", async () => {
    const path = script("local.scm", "(define b 10)");
    const { interpreter } = session();
    const result = interpreter.evalAll(
      `(define loader (lambda (file) (load file))) (loader (quote ${path}))`,
    );
    assert.strictEqual(printValue(result), "b");
    assert.strictEqual(interpreter.global.lookup("b"), undefined);
  });

  await test("errors inside a file do not stop later forms", async () => {
    const path = script("faulty.scm", "(car 5)\n(define ok 1)\n(+ ok 1)\n");
    const { interpreter, errors } = session();
    assert.strictEqual(interpreter.load(path), 2);
    assert.deepStrictEqual(
      errors.map((error) => error.kind),
      [ErrorKind.WrongArgumentType],
    );
  });

  // --- Failures ---

  console.log("\n--- Failures ---");

  await test("missing file is reported", async () => {
    const { interpreter, errors } = session();
    const missing = join(dir, "missing.scm");
    assert.strictEqual(interpreter.load(missing), null);
    assert.strictEqual(errors.length, 1);
    assert.strictEqual(errors[0].kind, ErrorKind.FileNotFound);
    assert.ok(errors[0].message.startsWith(`load: Cannot open file ${missing}: `));
  });

  await test("later forms evaluate after a failed load", async () => {
    const { interpreter, errors } = session();
    const missing = join(dir, "missing.scm");
    const result = interpreter.evalAll(`(load (quote ${missing})) (+ 1 2)`);
    assert.strictEqual(result, 3);
    assert.deepStrictEqual(
      errors.map((error) => error.kind),
      [ErrorKind.FileNotFound],
    );
  });

  await test("load of a non-symbol", async () => {
    const { interpreter, errors } = session();
    assert.strictEqual(interpreter.evalString("(load 5)"), null);
    assert.deepStrictEqual(
      errors.map((error) => error.kind),
      [ErrorKind.WrongArgumentType],
    );
  });

  await test("unquoted file name is evaluated first", async () => {
    const { interpreter, errors } = session();
    assert.strictEqual(interpreter.evalString("(load example.scm)"), null);
    assert.deepStrictEqual(
      errors.map((error) => error.kind),
      [ErrorKind.UnboundSymbol, ErrorKind.WrongArgumentType],
    );
  });

  // --- Sources ---

  console.log("\n--- Sources ---");

  await test("evalSource evaluates against the given frame", async () => {
    const { interpreter } = session();
    const frame = interpreter.global.child();
    const result = evalSource("(define c 3) (* c c)", frame, interpreter.evaluator);
    assert.strictEqual(result, 9);
    assert.strictEqual(frame.lookup("c"), 3);
    assert.strictEqual(interpreter.global.lookup("c"), undefined);
  });

  await test("loadFile into a child frame", async () => {
    const { interpreter } = session();
    const frame = interpreter.global.child();
    assert.strictEqual(loadFile(sequence, frame, interpreter.evaluator), 2);
    assert.strictEqual(interpreter.global.lookup("a"), undefined);
  });

  rmSync(dir, { recursive: true, force: true });

  // --- Summary ---

  console.log("\n=== Summary ===");
  console.log(`Passed: ${passed}`);
  console.log(`Failed: ${failed}`);
  console.log(`Total:  ${passed + failed}`);

  if (failed > 0) {
    process.exit(1);
  }
}

runTests().catch((error) => {
  console.error("Test suite failed:", error);
  process.exit(1);
});
