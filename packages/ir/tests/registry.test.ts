import { describe, it, expect, afterEach } from 'vitest';
import {
  ConfigService,
  DialectRegistry,
  DuplicateDefinitionError,
  Logger,
  LogLevel,
  UnhandledCaseError,
  UnknownOperationError,
  VerifyError,
  assertNever,
  createOperation,
  defineDialect,
  defineOp,
  parseLogLevel,
} from '../src/index.js';
import { ConstantOp, arith, builtin, constant, moduleOp, res } from '../../../test/fixtures/toy-dialect.js';

describe('DialectRegistry', () => {
  const quiet = new Logger('registry', LogLevel.ERROR, () => {});

  it('looks up registered kinds by name', () => {
    const registry = new DialectRegistry([builtin, arith], quiet);

    expect(registry.has('arith.addi')).toBe(true);
    expect(registry.lookup('arith.nope')).toBeUndefined();
    expect(registry.names()).toEqual(['builtin.module', 'arith.constant', 'arith.addi', 'arith.muli', 'arith.cmpi']);
    expect(registry.loadedDialects()).toEqual(['builtin', 'arith']);
  });

  it('creates operations through the factory contract', () => {
    const registry = new DialectRegistry([arith], quiet);
    const c = constant(2);
    const sum = registry.create('arith.addi', { operands: [res(c), res(c)], resultTypes: [res(c).type] });

    expect(sum.name).toBe('arith.addi');
    expect(sum.operands).toEqual([res(c), res(c)]);
  });

  it('fails on unknown names and duplicate registration', () => {
    const registry = new DialectRegistry([arith], quiet);

    expect(() => registry.get('cf.br')).toThrow(UnknownOperationError);
    expect(() => registry.register(defineOp('arith.addi'))).toThrow(DuplicateDefinitionError);
  });

  it('ignores loading the same dialect twice', () => {
    const registry = new DialectRegistry([arith, arith], quiet);
    expect(registry.names()).toHaveLength(4);
  });

  it('rejects a different dialect redefining a name', () => {
    const registry = new DialectRegistry([arith], quiet);
    const clash = defineDialect('arith2', [defineOp('arith.constant')]);

    expect(() => registry.loadDialect(clash)).toThrow("operation 'arith.constant' is already registered");
  });

  it('logs dialect loading at debug level', () => {
    const lines: string[] = [];
    const registry = new DialectRegistry([], new Logger('registry', LogLevel.DEBUG, line => lines.push(line)));

    registry.loadDialect(builtin);

    expect(lines.map(line => JSON.parse(line))).toEqual([
      { level: 'DEBUG', component: 'registry', message: 'dialect loaded', dialect: 'builtin', operations: 1 },
    ]);
  });
});

describe('Verification hook', () => {
  it('runs the hook of every nested operation', () => {
    const bad = createOperation(ConstantOp, { resultTypes: [] });
    const module = moduleOp([bad]);

    expect(() => module.verify()).toThrow(VerifyError);
    expect(() => module.verify()).toThrow("constant needs an integer value attribute ('arith.constant' at /0.0.0)");
  });

  it('passes well-formed operations', () => {
    expect(() => moduleOp([constant(1)]).verify()).not.toThrow();
  });

  it('does nothing for kinds without a hook', () => {
    const plain = createOperation(defineOp('test.plain'));
    expect(() => plain.verify()).not.toThrow();
  });
});

describe('Exhaustiveness', () => {
  type Shape = { kind: 'circle' } | { kind: 'square' };

  function sides(shape: Shape): number {
    switch (shape.kind) {
      case 'circle':
        return 0;
      case 'square':
        return 4;
      default:
        return assertNever(shape, 'sides');
    }
  }

  it('throws a catchable error for an unexpected case', () => {
    const rogue = JSON.parse('{"kind":"hexagon"}');
    expect(() => sides(rogue)).toThrow(UnhandledCaseError);
    expect(() => sides(rogue)).toThrow('unhandled case in sides: kind hexagon');
  });
});

describe('Configuration', () => {
  afterEach(() => {
    delete process.env.IRKIT_LOG_LEVEL;
    delete process.env.IRKIT_VERIFY_AFTER_REWRITE;
    ConfigService.resetForTesting();
  });

  it('reads the environment once per instance', () => {
    process.env.IRKIT_LOG_LEVEL = 'debug';
    process.env.IRKIT_VERIFY_AFTER_REWRITE = '1';
    ConfigService.resetForTesting();

    const config = ConfigService.getInstance();
    expect(config.logLevel).toBe(LogLevel.DEBUG);
    expect(config.verifyAfterRewrite).toBe(true);
    expect(config.traceRewrites).toBe(false);
    expect(ConfigService.getInstance()).toBe(config);
  });

  it('falls back to WARN for unknown levels', () => {
    expect(parseLogLevel('loud')).toBe(LogLevel.WARN);
    expect(parseLogLevel(undefined)).toBe(LogLevel.WARN);
    expect(parseLogLevel(' error ')).toBe(LogLevel.ERROR);
  });
});
