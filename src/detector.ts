import { glob } from 'glob';
import * as path from 'path';
import * as fs from 'fs';
import { FileAnalysis, TeaFlow, UiFlow } from './types';
import { analyzeFile } from './analyzer';
import { loadConfigWithInfo, mergeConfig, toVocabularies, UiFlowConfig } from './config';
import { UNKNOWN_ELEMENT } from './ui-element-resolver';
import { buildTeaFlows } from './tea-extractor';
import { shouldLogToConsole } from './utils';

export interface DetectionResults {
  files: FileAnalysis[];
  /** Every flow, in file order then traversal order */
  flows: UiFlow[];
  /** Message flows joined across files: a view and its `update` may live apart */
  teaFlows: TeaFlow[];
  /** Files that could not be read or parsed */
  skippedFiles: string[];
  summary: {
    filesAnalyzed: number;
    filesSkipped: number;
    flowsFound: number;
    teaFlows: number;
    /** Inventory totals */
    uiElements: number;
    actions: number;
    stateMutations: number;
  };
}

export interface DetectorOptions {
  pattern: string;
  ignore: string[];
  /** Optional configuration override (merged over the config file, if any) */
  config?: UiFlowConfig;
}

export const DEFAULT_PATTERN = '**/*.{js,jsx,ts,tsx}';

export const DEFAULT_IGNORE = [
  '**/node_modules/**',
  '**/.git/**',
  '**/dist/**',
  '**/build/**',
  '**/*.d.ts',
];

export async function detectUiFlows(
  targetPath: string,
  options: DetectorOptions
): Promise<DetectionResults> {
  // Merge order: defaults < config file < options.config
  const configResult = loadConfigWithInfo(targetPath);
  const config = options.config
    ? mergeConfig(configResult.config, options.config)
    : configResult.config;

  const vocabularies = toVocabularies(config);
  const files = await findFiles(targetPath, {
    ...options,
    ignore: [...options.ignore, ...config.ignore],
  });

  const analyses: FileAnalysis[] = [];
  const skippedFiles: string[] = [];

  for (const file of files) {
    try {
      const analysis = analyzeFile(file, { vocabularies });
      analyses.push(
        config.includeUnresolved
          ? analysis
          : {
              ...analysis,
              flows: analysis.flows.filter((flow) => flow.uiElement.elementType !== UNKNOWN_ELEMENT),
            }
      );
    } catch (error) {
      skippedFiles.push(file);
      if (shouldLogToConsole()) {
        console.warn(`Warning: Could not parse ${file}:`, error);
      }
    }
  }

  const flows = analyses.flatMap((analysis) => analysis.flows);
  const teaFlows = buildTeaFlows(
    analyses.flatMap((analysis) => analysis.msgEmissions),
    analyses.flatMap((analysis) => analysis.msgHandlers)
  );

  return {
    files: analyses,
    flows,
    teaFlows,
    skippedFiles,
    summary: {
      filesAnalyzed: analyses.length,
      filesSkipped: skippedFiles.length,
      flowsFound: flows.length,
      teaFlows: teaFlows.length,
      uiElements: sumOf(analyses, (analysis) => analysis.uiElements.length),
      actions: sumOf(analyses, (analysis) => analysis.actions.length),
      stateMutations: sumOf(analyses, (analysis) => analysis.stateMutations.length),
    },
  };
}

async function findFiles(targetPath: string, options: DetectorOptions): Promise<string[]> {
  const absolutePath = path.resolve(targetPath);

  if (fs.statSync(absolutePath).isFile()) {
    return [absolutePath];
  }

  const files = await glob(options.pattern, {
    cwd: absolutePath,
    ignore: options.ignore,
    absolute: true,
    nodir: true,
  });

  // glob's order depends on the file system
  return files.sort();
}

function sumOf(analyses: FileAnalysis[], count: (analysis: FileAnalysis) => number): number {
  return analyses.reduce((sum, analysis) => sum + count(analysis), 0);
}
