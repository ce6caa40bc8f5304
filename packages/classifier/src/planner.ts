/**
 * Move Planner
 *
 * Walks a source folder, classifies every file and works out where it
 * belongs under the target folder according to a rule. Planning never
 * touches the files; applyMovePlan performs the moves.
 */

import { existsSync } from 'node:fs';
import { readdir } from 'node:fs/promises';
import { extname, join, relative, resolve, sep, basename, dirname } from 'node:path';
import {
  NotFoundError,
  ValidationError,
  errorMessage,
  type ClassificationResult,
} from '@fileclassify/core';
import { ParserFactory, DEFAULT_SUMMARY_LENGTH } from '@fileclassify/parsers';
import { generateTargetPath, parseRuleString } from '@fileclassify/rules';
import { createLogger, formatDisplayPath, moveFile } from '@fileclassify/utils';
import { classifyFile, placeholderClassification } from './classifier.js';
import type { LlmClient } from './llm/types.js';

const log = createLogger({ component: 'planner' });

export interface PlanOptions {
  sourceDir: string;
  targetDir: string;
  rule: string;
  llm?: LlmClient;
  /** Send a content excerpt to the model when a parser exists */
  useContent?: boolean;
  recursive?: boolean;
  signal?: AbortSignal;
  onProgress?: (done: number, total: number, file: string) => void;
}

export interface PlannedMove {
  source: string;
  destination: string;
  relativeTarget: string;
  classification: ClassificationResult;
}

export interface MovePlan {
  sourceDir: string;
  targetDir: string;
  rule: string;
  moves: PlannedMove[];
  warnings: string[];
}

export interface ApplyResult {
  moved: number;
  failed: Array<{ source: string; error: string }>;
}

function isInside(child: string, parent: string): boolean {
  const rel = relative(parent, child);
  return rel === '' || (!rel.startsWith('..') && !rel.startsWith(sep) && !/^[a-zA-Z]:/.test(rel));
}

async function listFiles(
  root: string,
  exclude: string | undefined,
  recursive: boolean,
  signal?: AbortSignal
): Promise<string[]> {
  const files: string[] = [];
  const pending = [root];

  while (pending.length > 0) {
    signal?.throwIfAborted();
    const current = pending.pop();
    if (current === undefined) {
      break;
    }

    const entries = await readdir(current, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = join(current, entry.name);
      if (entry.isDirectory()) {
        if (recursive && (exclude === undefined || !isInside(fullPath, exclude))) {
          pending.push(fullPath);
        }
      } else if (entry.isFile()) {
        files.push(fullPath);
      }
    }
  }

  return files.sort((a, b) => a.localeCompare(b));
}

/**
 * First free name in a folder: "name.ext", "name (1).ext", ...
 */
function uniqueDestination(desired: string, taken: Set<string>): string {
  if (!taken.has(desired) && !existsSync(desired)) {
    return desired;
  }

  const ext = extname(desired);
  const stem = basename(desired, ext);
  const folder = dirname(desired);

  for (let n = 1; ; n++) {
    const candidate = join(folder, `${stem} (${n})${ext}`);
    if (!taken.has(candidate) && !existsSync(candidate)) {
      return candidate;
    }
  }
}

async function readExcerpt(filePath: string): Promise<string | undefined> {
  if (!ParserFactory.hasParser(filePath)) {
    return undefined;
  }
  const parser = ParserFactory.getParser(filePath);
  const summary = await parser.extractSummary(DEFAULT_SUMMARY_LENGTH);
  return summary || undefined;
}

/**
 * Work out the destination of every file under the source folder
 */
export async function planMoves(options: PlanOptions): Promise<MovePlan> {
  const sourceDir = resolve(options.sourceDir);
  const targetDir = resolve(options.targetDir);
  const { rule, llm, signal, onProgress } = options;
  const useContent = options.useContent ?? true;
  const recursive = options.recursive ?? true;

  if (!existsSync(sourceDir)) {
    throw new NotFoundError('Folder', sourceDir);
  }

  const rules = parseRuleString(rule);
  if (rules.length === 0) {
    throw new ValidationError('rule', 'at least one field is required');
  }

  // A target inside the source is skipped unless they are the same folder
  const exclude = targetDir === sourceDir ? undefined : targetDir;
  const files = await listFiles(sourceDir, exclude, recursive, signal);
  const modelReady = llm?.isAvailable() ?? false;
  const taken = new Set<string>();
  const moves: PlannedMove[] = [];
  const warnings: string[] = [];

  if (!modelReady) {
    warnings.push('No model configured; every file is classified as Unknown');
  }

  for (const [index, file] of files.entries()) {
    signal?.throwIfAborted();

    let classification: ClassificationResult;
    try {
      const contentExcerpt = modelReady && useContent ? await readExcerpt(file) : undefined;
      classification = await classifyFile(file, { rules, llm, contentExcerpt });
    } catch (error) {
      log.warn({ file, err: error }, 'Classification failed, using placeholder');
      warnings.push(`${formatDisplayPath(file, sourceDir)}: ${errorMessage(error)}`);
      classification = placeholderClassification(file);
    }

    const relativeTarget = generateTargetPath(rule, classification);
    const desired = join(targetDir, relativeTarget, basename(file));

    if (desired !== file) {
      const destination = uniqueDestination(desired, taken);
      taken.add(destination);
      moves.push({ source: file, destination, relativeTarget, classification });
    }

    onProgress?.(index + 1, files.length, file);
  }

  log.info({ source: sourceDir, target: targetDir, files: files.length, moves: moves.length }, 'Move plan ready');

  return { sourceDir, targetDir, rule, moves, warnings };
}

/**
 * Carry out a plan; failures are collected, not thrown
 */
export async function applyMovePlan(plan: MovePlan): Promise<ApplyResult> {
  const result: ApplyResult = { moved: 0, failed: [] };

  for (const move of plan.moves) {
    try {
      await moveFile(move.source, move.destination);
      result.moved += 1;
    } catch (error) {
      log.error({ source: move.source, err: error }, 'Move failed');
      result.failed.push({ source: move.source, error: errorMessage(error) });
    }
  }

  return result;
}

/**
 * One "source -> destination" line per planned move
 */
export function formatMovePlan(plan: MovePlan, cwd: string = process.cwd()): string[] {
  return plan.moves.map(
    (move) => `${formatDisplayPath(move.source, cwd)} -> ${formatDisplayPath(move.destination, cwd)}`
  );
}
