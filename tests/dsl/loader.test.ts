import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { DefinitionError, loadJobDefinitionFile, parseJobDefinition } from '../../src/dsl/loader';
import { DEFAULT_EXPECTED_OUTPUTS } from '../../src/dsl/schema';

function captureDefinitionError(fn: () => unknown): DefinitionError {
  try {
    fn();
  } catch (err) {
    if (err instanceof DefinitionError) return err;
    throw err;
  }
  throw new Error('expected a DefinitionError');
}

describe('parseJobDefinition', () => {
  test('fills defaults for a minimal document', () => {
    const definition = parseJobDefinition({ name: 'echo', methods: { print: { input_template: 'x=$x' } } });
    expect(definition.name).toBe('echo');
    expect(definition.methods).toHaveLength(1);
    expect(definition.methods[0]).toEqual({
      name: 'print',
      template: 'x=$x',
      inputFile: 'input.in',
      files: [],
      needs: [],
      parameterDefaults: {},
      outputs: [],
    });
    expect(definition.execution.local).toEqual({ environment: {} });
    expect(definition.expectedOutputs).toEqual(DEFAULT_EXPECTED_OUTPUTS);
    expect(definition.onParseError).toBe('ignore');
    expect(definition.defaultResults).toEqual({});
  });

  test('returns a deeply frozen definition', () => {
    const definition = parseJobDefinition({ name: 'echo', methods: { print: { input_template: 'x' } } });
    expect(Object.isFrozen(definition)).toBe(true);
    expect(Object.isFrozen(definition.methods[0])).toBe(true);
    expect(Object.isFrozen(definition.methods[0].parameterDefaults)).toBe(true);
  });

  test('joins template lines and unescapes newlines', () => {
    const definition = parseJobDefinition({
      name: 'echo',
      methods: { a: { input_template: ['line one', 'line two'] }, b: { input_template: 'first\\nsecond \\"q\\"' } },
    });
    expect(definition.methods[0].template).toBe('line one\nline two');
    expect(definition.methods[1].template).toBe('first\nsecond "q"');
  });

  test('normalizes rule families to camelCase shapes', () => {
    const definition = parseJobDefinition({
      name: 'md',
      methods: { gk: {}, nemd: {} },
      method_resolution: {
        nemd: { condition: { requires_any: ['gradient'] } },
        by_pattern: { condition: { patterns: { style: '^gk' } }, method: 'gk' },
      },
      understands: { 'green kubo': { keywords: ['equilibrium'], aliases: ['gk'], method: 'gk' } },
      context_builders: {
        steps: { type: 'parameter_transform', source: 'run', transform: { type: 'steps_calculation', timestep: 2 }, default: 5 },
      },
      execution: { docker: { image: 'tool:latest', environment: { THREADS: 4 } } },
      parsers: { table: { type: 'columnar', skip_lines: 2 } },
      output_parsing: { files: [{ pattern: '*.dat', parser: 'table' }], on_error: 'fail' },
      result_assets: { k: { kind: 'Params', requires_data: ['kappa'], payload: { kappa: 'kappa' } } },
    });

    expect(definition.resolutionRules).toEqual([
      { name: 'nemd', condition: { kind: 'requiresAny', keys: ['gradient'] }, method: 'nemd' },
      { name: 'by_pattern', condition: { kind: 'patterns', patterns: { style: '^gk' } }, method: 'gk' },
    ]);
    expect(definition.understands).toEqual([{ phrase: 'green kubo', keywords: ['equilibrium', 'gk'], method: 'gk' }]);
    expect(definition.contextBuilders).toEqual([
      {
        type: 'parameter_transform',
        name: 'steps',
        source: 'run',
        transform: { type: 'steps_calculation', multiplier: 1000, timestep: 2 },
        defaultValue: 5,
      },
    ]);
    expect(definition.execution).toEqual({
      docker: { image: 'tool:latest', environment: { THREADS: '4' }, mountPath: '/work' },
    });
    expect(definition.parsers).toEqual({ table: { type: 'columnar', skipLines: 2 } });
    expect(definition.outputRules).toEqual([{ pattern: '*.dat', parser: 'table' }]);
    expect(definition.onParseError).toBe('fail');
    expect(definition.resultAssets).toEqual([
      { name: 'k', kind: 'Params', requiresData: ['kappa'], payload: { kappa: 'kappa' } },
    ]);
  });

  test('rejects unknown builder kinds', () => {
    const error = captureDefinitionError(() =>
      parseJobDefinition({
        name: 'x',
        methods: { a: {} },
        context_builders: { b: { type: 'magic', source: 'y' } },
      }),
    );
    expect(error.issues).toHaveLength(1);
    expect(error.issues[0].code).toBe('invalid_union_discriminator');
    expect(error.issues[0].path).toEqual(['context_builders', 'b', 'type']);
  });

  test('rejects unknown keys inside closed variants', () => {
    const error = captureDefinitionError(() =>
      parseJobDefinition({
        name: 'x',
        methods: { a: {} },
        context_builders: {
          b: { type: 'parameter_transform', source: 'y', transform: { type: 'list_to_string', sep: ',' } },
        },
      }),
    );
    expect(error.issues[0].code).toBe('unrecognized_keys');
  });

  test('rejects invalid regular expressions', () => {
    const error = captureDefinitionError(() =>
      parseJobDefinition({ name: 'x', methods: { a: {} }, parsers: { r: { type: 'regex', patterns: ['(unclosed'] } } }),
    );
    expect(error.issues[0].message).toBe('Invalid regular expression');
  });

  test('reports references to undeclared methods, parsers and generators', () => {
    const error = captureDefinitionError(() =>
      parseJobDefinition({
        name: 'x',
        methods: { a: { files: { data: { generator: 'missing_gen' } } } },
        method_resolution: { ghost: { condition: { requires_all: ['k'] } } },
        output_parsing: { files: [{ name: 'out.txt', parser: 'nope' }] },
      }),
    );
    expect(error.issues.map((issue) => issue.message)).toEqual([
      'Unknown method "ghost"',
      'Unknown parser "nope"',
      'Unknown generator "missing_gen"',
    ]);
    expect(error.issues.every((issue) => issue.code === 'invalid_reference')).toBe(true);
  });

  test('rejects an execution mode without a backend block', () => {
    const error = captureDefinitionError(() =>
      parseJobDefinition({ name: 'x', methods: { a: {} }, execution: { mode: 'hpc', local: {} } }),
    );
    expect(error.issues[0].path).toEqual(['execution', 'mode']);
  });

  test('formats issues one per line', () => {
    const error = captureDefinitionError(() => parseJobDefinition({}, 'bad.json'));
    expect(error.format()).toBe('Job definition bad.json is invalid:\n  - name: Required');
  });
});

describe('loadJobDefinitionFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'definitions-test-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  test('reads template files relative to the document', async () => {
    await fs.mkdir(path.join(dir, 'templates'));
    await fs.writeFile(path.join(dir, 'templates', 'run.in'), 'temperature ${T}\n', 'utf8');
    const file = path.join(dir, 'md.json');
    await fs.writeFile(
      file,
      JSON.stringify({ name: 'md', methods: { gk: { template_file: 'templates/run.in' } } }),
      'utf8',
    );

    const definition = await loadJobDefinitionFile(file);
    expect(definition.source).toBe(file);
    expect(definition.methods[0].template).toBe('temperature ${T}\n');
    expect(definition.methods[0].templateFile).toBe('templates/run.in');
  });

  test('fails when a template file is missing', async () => {
    const file = path.join(dir, 'md.json');
    await fs.writeFile(file, JSON.stringify({ name: 'md', methods: { gk: { template_file: 'nope.in' } } }), 'utf8');
    await expect(loadJobDefinitionFile(file)).rejects.toBeInstanceOf(DefinitionError);
  });

  test('fails on malformed JSON', async () => {
    const file = path.join(dir, 'broken.json');
    await fs.writeFile(file, '{"name": ', 'utf8');
    await expect(loadJobDefinitionFile(file)).rejects.toThrow('Job definition is not valid JSON');
  });
});
