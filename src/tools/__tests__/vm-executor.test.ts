import { describe, it, expect, beforeAll, vi } from 'vitest';
import { VmExecutor } from '../vm-executor.js';
import { EMPTY_OUTPUT } from '../executor.js';
import { logger, LogLevel } from '../../utils/logger.js';

beforeAll(() => {
  logger.setLogLevel(LogLevel.SILENT);
});

describe('VmExecutor', () => {
  const executor = new VmExecutor();

  it('captures printed output', () => {
    const ns = executor.createNamespace();

    expect(executor.execute('print(2 + 2)', ns)).toBe('4');
    expect(executor.execute('console.log("a", 1, { b: 2 })', ns)).toBe('a 1 { b: 2 }');
  });

  it('shows the value of a bare expression', () => {
    const ns = executor.createNamespace();

    expect(executor.execute('\n6 * 7\n', ns)).toBe('42');
    expect(executor.execute('1 / 0', ns)).toBe('Infinity');
  });

  it('keeps bindings between blocks of the same namespace', () => {
    const ns = executor.createNamespace();

    expect(executor.execute('const x = 40', ns)).toBe(EMPTY_OUTPUT);
    expect(executor.execute('function sq(n) { return n * n }', ns)).toBe(EMPTY_OUTPUT);
    expect(executor.execute('x + 2', ns)).toBe('42');
    expect(executor.execute('print(sq(9))', ns)).toBe('81');
  });

  it('isolates namespaces from each other', () => {
    const first = executor.createNamespace();
    const second = executor.createNamespace();

    executor.execute('var y = 1', first);

    expect(executor.execute('typeof y', second)).toBe("'undefined'");
  });

  it('reports empty output with a placeholder', () => {
    const ns = executor.createNamespace();

    expect(executor.execute('', ns)).toBe(EMPTY_OUTPUT);
    expect(executor.execute('let unused = 3;', ns)).toBe(EMPTY_OUTPUT);
  });

  it('renders a runtime fault as a trace instead of throwing', () => {
    const ns = executor.createNamespace();

    const output = executor.execute('undefinedFunction()', ns);

    expect(output.startsWith('Traceback:\n')).toBe(true);
    expect(output).toContain('ReferenceError: undefinedFunction is not defined');
    expect(output).not.toContain('node:vm');
  });

  it('keeps output printed before a fault', () => {
    const ns = executor.createNamespace();

    const output = executor.execute('print("before"); null.x', ns);

    expect(output).toMatch(/^before\nTraceback:\nTypeError: Cannot read properties of null/);
  });

  it('renders syntax errors', () => {
    const ns = executor.createNamespace();

    expect(executor.execute('let = ;', ns)).toContain('SyntaxError');
  });

  it('renders thrown non-error values', () => {
    const ns = executor.createNamespace();

    expect(executor.execute('throw "boom"', ns)).toBe("Uncaught 'boom'");
  });

  it('stops a block that runs past its time limit', () => {
    const fast = new VmExecutor({ timeoutMs: 50 });
    const ns = fast.createNamespace();

    expect(fast.execute('while (true) {}', ns)).toContain('Script execution timed out after 50ms');
    expect(fast.execute('print("still usable")', ns)).toBe('still usable');
  });

  it('runs promise jobs before returning', () => {
    const ns = executor.createNamespace();

    expect(executor.execute('Promise.resolve().then(() => print("late")); undefined', ns)).toBe('late');
    expect(executor.execute('(async () => 6 * 7)()', ns)).toBe('42');
  });

  it('reports a rejected promise as a fault without reaching the host', async () => {
    const ns = executor.createNamespace();
    const unhandled = vi.fn();
    process.on('unhandledRejection', unhandled);

    try {
      const output = executor.execute('(async () => { throw new Error("boom") })()', ns);
      await new Promise(resolve => setImmediate(resolve));

      expect(output).toMatch(/^Traceback:\nError: boom\n\s+at .*snippet\.js:1:\d+/);
      expect(output.split('\n').slice(2).every(line => line.includes('snippet.js'))).toBe(true);
      expect(unhandled).not.toHaveBeenCalled();
    } finally {
      process.off('unhandledRejection', unhandled);
    }
  });

  it('bounds a promise-job loop by the time limit', () => {
    const fast = new VmExecutor({ timeoutMs: 50 });
    const ns = fast.createNamespace();

    const output = fast.execute('(function spin() { Promise.resolve().then(spin) })()', ns);

    expect(output).toContain('Script execution timed out after 50ms');
  });

  it('falls back to a placeholder when a fault cannot be printed', () => {
    const ns = executor.createNamespace();

    const output = executor.execute(
      'const e = new Error("x"); Object.defineProperty(e, "stack", { get() { throw new Error("stack getter") } }); throw e',
      ns
    );

    expect(output).toBe('Uncaught exception (unprintable)');
  });

  it('falls back to a placeholder when a value cannot be printed', () => {
    const ns = executor.createNamespace();

    const output = executor.execute('({ [Symbol.for("nodejs.util.inspect.custom")]() { throw new Error("no") } })', ns);

    expect(output).toBe('(unprintable value)');
  });

  it('refuses to run in a released namespace', () => {
    const ns = executor.createNamespace();
    executor.releaseNamespace(ns);

    expect(ns.disposed).toBe(true);
    expect(executor.execute('1', ns)).toContain('Execution namespace has been released');
  });
});
