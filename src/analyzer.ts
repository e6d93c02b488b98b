/**
 * File Analyzer
 *
 * Entry points that go from a file (or its source text) to its UI flows,
 * inventories and message flows.
 *
 * @example
 * ```typescript
 * const analysis = analyzeFile('src/app.ts');
 * for (const flow of analysis.flows) {
 *   console.log(flow.uiElement.label, flow.action.actionType);
 * }
 * ```
 */

import * as fs from 'fs';
import { ExtractOptions, FileAnalysis } from './types';
import { ParsedFile, parseSource } from './parser';
import { extractFlows } from './flow-extractor';
import { extractActions, extractStateMutations, extractUiElements } from './inventory-extractor';
import { buildTeaFlows, extractMsgEmissions, extractMsgHandlers } from './tea-extractor';

/** Analyze source code directly */
export function analyzeSource(
  filePath: string,
  content: string,
  options: ExtractOptions = {}
): FileAnalysis {
  let parsed: ParsedFile;
  try {
    parsed = parseSource(content, filePath);
  } catch (error) {
    throw new Error(`Parse error in ${filePath}: ${errorMessage(error)}`, { cause: error });
  }

  const { ast } = parsed;
  const msgEmissions = extractMsgEmissions(filePath, ast, options);
  const msgHandlers = extractMsgHandlers(filePath, ast, options);

  return {
    path: filePath,
    uiElements: extractUiElements(filePath, ast, options),
    actions: extractActions(filePath, ast, options),
    stateMutations: extractStateMutations(filePath, ast, options),
    flows: extractFlows(filePath, ast, options),
    msgEmissions,
    msgHandlers,
    teaFlows: buildTeaFlows(msgEmissions, msgHandlers),
  };
}

/** Read and analyze a single source file */
export function analyzeFile(filePath: string, options: ExtractOptions = {}): FileAnalysis {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new Error(`Failed to read ${filePath}: ${errorMessage(error)}`, { cause: error });
  }

  return analyzeSource(filePath, content, options);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
