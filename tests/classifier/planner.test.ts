import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { applyMovePlan, formatMovePlan, planMoves, type MovePlan } from '@fileclassify/classifier';
import { NotFoundError, ValidationError } from '@fileclassify/core';
import { pathExists } from '@fileclassify/utils';
import { ScriptedLlm } from './scriptedLlm.js';
import { writeDocx } from '../parsers/documents.js';

describe('move planner', () => {
  let source: string;
  let target: string;

  beforeEach(async () => {
    source = await mkdtemp(join(tmpdir(), 'fileclassify-plan-'));
    target = join(source, 'sorted');
  });

  afterEach(async () => {
    await rm(source, { recursive: true, force: true });
  });

  async function put(relativePath: string, content = ''): Promise<string> {
    const path = join(source, relativePath);
    await mkdir(join(path, '..'), { recursive: true });
    await writeFile(path, content);
    return path;
  }

  it('should send everything to Unknown without a model', async () => {
    const contract = await put('Contract_2024.txt');
    const notes = await put(join('sub', 'notes.md'));

    const plan = await planMoves({ sourceDir: source, targetDir: target, rule: '类型 >> 年份' });

    expect(plan.warnings).toEqual(['No model configured; every file is classified as Unknown']);
    expect(plan.moves.map(({ source: from, destination, relativeTarget }) => ({ from, destination, relativeTarget }))).toEqual([
      { from: contract, destination: join(target, 'Unknown', 'Unknown', 'Contract_2024.txt'), relativeTarget: join('Unknown', 'Unknown') },
      { from: notes, destination: join(target, 'Unknown', 'Unknown', 'notes.md'), relativeTarget: join('Unknown', 'Unknown') },
    ]);
  });

  it('should number files that would land on the same name', async () => {
    await put('a.txt');
    await put(join('sub', 'a.txt'));
    await put(join('sorted', 'Unknown', 'b.txt'));
    await put('b.txt');

    const plan = await planMoves({ sourceDir: source, targetDir: target, rule: 'Category' });

    expect(plan.moves.map((move) => move.destination)).toEqual([
      join(target, 'Unknown', 'a.txt'),
      join(target, 'Unknown', 'b (1).txt'),
      join(target, 'Unknown', 'a (1).txt'),
    ]);
  });

  it('should classify with the model and the file content', async () => {
    const invoice = await put('scan1.txt', 'Invoice No. 42');
    await put('scan2.txt', 'Service agreement');
    const llm = new ScriptedLlm((prompt) =>
      prompt.includes('Invoice No. 42')
        ? '{"category": "invoice", "year": "2024"}'
        : '{"category": "contract", "year": "2023"}'
    );
    const onProgress = vi.fn();

    const plan = await planMoves({
      sourceDir: source,
      targetDir: target,
      rule: 'Category [Contract, Invoice] >> Year',
      llm,
      onProgress,
    });

    expect(plan.warnings).toEqual([]);
    expect(plan.moves.map((move) => move.relativeTarget)).toEqual([
      join('Invoice', '2024'),
      join('Contract', '2023'),
    ]);
    expect(plan.moves[0]?.classification.original_name).toBe('scan1');
    expect(onProgress).toHaveBeenCalledTimes(2);
    expect(onProgress).toHaveBeenLastCalledWith(2, 2, join(source, 'scan2.txt'));
    expect(plan.moves[0]?.source).toBe(invoice);
  });

  it('should send the text of office documents to the model', async () => {
    await writeDocx(join(source, 'scan3.docx'), ['Lease agreement for unit 7']);
    const llm = new ScriptedLlm(() => '{"category": "Contract"}');

    await planMoves({ sourceDir: source, targetDir: target, rule: 'Category', llm });

    expect(llm.prompts[0]?.prompt).toContain('Lease agreement for unit 7');
  });

  it('should classify by name only when content is off', async () => {
    await put('scan1.txt', 'Invoice No. 42');
    const llm = new ScriptedLlm(() => '{"category": "Contract"}');

    await planMoves({ sourceDir: source, targetDir: target, rule: 'Category', llm, useContent: false });

    expect(llm.prompts[0]?.prompt).not.toContain('Content excerpt:');
  });

  it('should fall back to the placeholder when classification fails', async () => {
    await put('broken.txt', 'text');
    const llm = new ScriptedLlm(() => 'no structured answer');

    const plan = await planMoves({ sourceDir: source, targetDir: target, rule: 'Category', llm });

    expect(plan.warnings).toEqual(['./broken.txt: No JSON object found in response']);
    expect(plan.moves[0]?.destination).toBe(join(target, 'Unknown', 'broken.txt'));
  });

  it('should leave files that are already in place', async () => {
    await put(join('Unknown', 'kept.txt'));
    await put('loose.txt');

    const plan = await planMoves({ sourceDir: source, targetDir: source, rule: 'Category' });

    expect(plan.moves.map((move) => move.destination)).toEqual([join(source, 'Unknown', 'loose.txt')]);
  });

  it('should only look at the top level when not recursive', async () => {
    await put('top.txt');
    await put(join('deep', 'inner.txt'));

    const plan = await planMoves({ sourceDir: source, targetDir: target, rule: 'Year', recursive: false });

    expect(plan.moves).toHaveLength(1);
    expect(plan.moves[0]?.source).toBe(join(source, 'top.txt'));
  });

  it('should reject a rule without fields', async () => {
    await expect(planMoves({ sourceDir: source, targetDir: target, rule: ' ' })).rejects.toBeInstanceOf(
      ValidationError
    );
  });

  it('should reject a missing source folder', async () => {
    await expect(
      planMoves({ sourceDir: join(source, 'nope'), targetDir: target, rule: 'Year' })
    ).rejects.toBeInstanceOf(NotFoundError);
  });

  it('should move the files and collect failures', async () => {
    await put('a.txt', 'alpha');
    const plan = await planMoves({ sourceDir: source, targetDir: target, rule: 'Year' });
    const withMissing: MovePlan = {
      ...plan,
      moves: [
        ...plan.moves,
        {
          source: join(source, 'vanished.txt'),
          destination: join(target, 'Unknown', 'vanished.txt'),
          relativeTarget: 'Unknown',
          classification: plan.moves[0]?.classification ?? {
            category: 'Unknown',
            year: 'Unknown',
            month: 'Unknown',
            summary: 'Unknown',
            original_name: 'vanished',
          },
        },
      ],
    };

    const result = await applyMovePlan(withMissing);

    expect(result.moved).toBe(1);
    expect(result.failed).toHaveLength(1);
    expect(result.failed[0]?.source).toBe(join(source, 'vanished.txt'));
    expect(await readFile(join(target, 'Unknown', 'a.txt'), 'utf8')).toBe('alpha');
    expect(await pathExists(join(source, 'a.txt'))).toBe(false);
  });

  it('should not overwrite a file that appeared after planning', async () => {
    await put('a.txt', 'alpha');
    const plan = await planMoves({ sourceDir: source, targetDir: target, rule: 'Year' });
    await mkdir(join(target, 'Unknown'), { recursive: true });
    await writeFile(join(target, 'Unknown', 'a.txt'), 'intruder');

    const result = await applyMovePlan(plan);

    expect(result.moved).toBe(0);
    expect(result.failed).toEqual([
      { source: join(source, 'a.txt'), error: `Destination already exists: ${join(target, 'Unknown', 'a.txt')}` },
    ]);
    expect(await readFile(join(target, 'Unknown', 'a.txt'), 'utf8')).toBe('intruder');
    expect(await readFile(join(source, 'a.txt'), 'utf8')).toBe('alpha');
  });

  it('should render one line per move', async () => {
    await put('a.txt');
    const plan = await planMoves({ sourceDir: source, targetDir: target, rule: 'Year' });

    expect(formatMovePlan(plan, source)).toEqual([`./a.txt -> ./${join('sorted', 'Unknown', 'a.txt')}`]);
  });
});
