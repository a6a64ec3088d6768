import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  compileScenario,
  compileScenarioDocument,
  loadScenarioFile,
  loadScenarios,
} from '../../src/core/compiler.js';
import { ScenarioLoadError } from '../../src/core/errors.js';
import { createLogger } from '../../src/utils/logger.js';

describe('compileScenario', () => {
  it('keeps recognized steps and reports the rest as positioned warnings', () => {
    const lines: string[] = [];
    const scenario = compileScenario(
      {
        name: 'Login',
        description: '',
        tags: [],
        steps: ['click login', 'banana', 'wait for 1 second'],
      },
      { logger: createLogger({ write: (l) => lines.push(l) }) },
    );

    expect(scenario.steps.map((s) => s.action)).toEqual(['click', 'wait']);
    expect(scenario.warnings).toEqual([
      { rawText: 'banana', reason: 'unrecognized step grammar', scenario: 'Login', index: 1 },
    ]);
    expect(lines).toEqual(['⚠️  [Login] step 2 skipped (unrecognized step grammar): "banana"']);
  });

  it('records url and source when present', () => {
    const scenario = compileScenario(
      { name: 'Home', description: 'd', tags: ['smoke'], url: '/home', steps: [] },
      { source: 'home.yaml' },
    );
    expect(scenario.url).toBe('/home');
    expect(scenario.source).toBe('home.yaml');
    expect(scenario.tags).toEqual(['smoke']);
  });
});

describe('compileScenarioDocument', () => {
  it('applies scenario defaults', () => {
    const [scenario] = compileScenarioDocument({ scenarios: [{ steps: ['click x'] }] });
    expect(scenario?.name).toBe('Unnamed Scenario');
    expect(scenario?.description).toBe('');
    expect(scenario?.steps).toHaveLength(1);
  });

  it('rejects a document without scenarios', () => {
    expect(() => compileScenarioDocument({})).toThrow(ScenarioLoadError);
    expect(() => compileScenarioDocument({})).toThrow(/scenarios: Required/);
  });
});

describe('loading scenario files', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'plainstep-compiler-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('loads every yaml file of a directory in name order', async () => {
    await writeFile(path.join(dir, 'b.yaml'), 'scenarios:\n  - name: Second\n    steps: ["click b"]\n');
    await writeFile(path.join(dir, 'a.yml'), 'scenarios:\n  - name: First\n    steps: ["click a"]\n');
    await writeFile(path.join(dir, 'notes.txt'), 'not a scenario');

    const scenarios = await loadScenarios(dir);
    expect(scenarios.map((s) => s.name)).toEqual(['First', 'Second']);
    expect(scenarios[0]?.source).toBe(path.join(dir, 'a.yml'));
  });

  it('turns scalar values in map steps into strings', async () => {
    const file = path.join(dir, 'age.yaml');
    await writeFile(
      file,
      [
        'scenarios:',
        '  - name: Age',
        '    steps:',
        '      - action: type',
        '        target: age field',
        '        value: 42',
      ].join('\n'),
    );

    const [scenario] = await loadScenarioFile(file);
    expect(scenario?.steps[0]).toMatchObject({ action: 'type', target: 'age field', value: '42' });
  });

  it('reports a missing path', async () => {
    const missing = path.join(dir, 'nope.yaml');
    await expect(loadScenarios(missing)).rejects.toThrow(
      `Test scenario path not found: ${missing}`,
    );
  });

  it('reports invalid YAML', async () => {
    const file = path.join(dir, 'broken.yaml');
    await writeFile(file, 'scenarios: [\n');
    await expect(loadScenarioFile(file)).rejects.toBeInstanceOf(ScenarioLoadError);
    await expect(loadScenarioFile(file)).rejects.toThrow(/not valid YAML/);
  });
});
