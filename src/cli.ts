#!/usr/bin/env node

import { Command } from 'commander';
import * as path from 'path';
import * as fs from 'fs';
import chalk from 'chalk';
import { codeFrameColumns } from '@babel/code-frame';
import { detectUiFlows, DetectionResults, DEFAULT_IGNORE, DEFAULT_PATTERN } from './detector';
import { DEFAULT_CONFIG } from './config';
import { generateFlowMermaid, generateMermaid, generateSummaryMermaid } from './graph-generator';
import { TeaFlow, UiFlow } from './types';

interface CliOptions {
  pattern: string;
  ignore: string[];
  json?: boolean;
  mermaid?: boolean;
  inventory?: boolean;
  summary?: boolean;
  compact?: boolean;
  color?: boolean; // Commander turns --no-color into color: false
  code?: boolean; // --no-code
}

// Cache for file contents to avoid re-reading
const fileContentCache = new Map<string, string>();

function getFileContent(filePath: string): string | null {
  const cached = fileContentCache.get(filePath);
  if (cached !== undefined) {
    return cached;
  }
  try {
    const content = fs.readFileSync(filePath, 'utf-8');
    fileContentCache.set(filePath, content);
    return content;
  } catch {
    return null;
  }
}

function generateCodeFrame(filePath: string, line: number): string | null {
  const content = getFileContent(filePath);
  if (!content || line <= 0) return null;

  return codeFrameColumns(
    content,
    { start: { line } },
    {
      highlightCode: chalk.level > 0,
      linesAbove: 1,
      linesBelow: 2,
    }
  );
}

function describeElement(flow: UiFlow): string {
  const { uiElement } = flow;
  const label = uiElement.label !== undefined ? ` "${uiElement.label}"` : '';
  const via = uiElement.responseVar ? ` (via ${uiElement.responseVar})` : '';
  return `${uiElement.elementType}${label}${via}`;
}

function describeMutations(flow: UiFlow): string {
  return flow.stateMutations
    .map((mutation) => `${mutation.target} [${mutation.mutationType}]`)
    .join(', ');
}

function displayCompactFlow(flow: UiFlow) {
  const relPath = path.relative(process.cwd(), flow.action.filePath);
  console.log(
    `${chalk.gray(`${relPath}:${flow.action.line}`)} - ${chalk.cyan(describeElement(flow))} ` +
      `${chalk.yellow(`.${flow.action.actionType}()`)} -> ${chalk.green(describeMutations(flow))}`
  );
}

function describeEmission({ emission }: TeaFlow): string {
  const label = emission.label !== undefined ? ` "${emission.label}"` : '';
  return `${emission.component}.${emission.variant}${label}`;
}

function describeHandler({ handler }: TeaFlow): string {
  if (!handler) return '(no handler)';
  return handler.stateMutations
    .map((mutation) => `${mutation.target} [${mutation.mutationType}]`)
    .join(', ');
}

function displayCompactTeaFlow(teaFlow: TeaFlow) {
  const { emission } = teaFlow;
  const relPath = path.relative(process.cwd(), emission.filePath);
  console.log(
    `${chalk.gray(`${relPath}:${emission.line}`)} - ${chalk.cyan(describeEmission(teaFlow))} ` +
      `${chalk.yellow(`.${emission.action}()`)} => ${chalk.magenta(emission.msg)} -> ` +
      chalk.green(describeHandler(teaFlow))
  );
}

function displayTeaFlow(teaFlow: TeaFlow, index: number) {
  const { emission, handler } = teaFlow;
  console.log(
    chalk.cyan(`${index + 1}. ${describeEmission(teaFlow)}`) +
      chalk.yellow(` → .${emission.action}()`) +
      chalk.magenta(` → ${emission.msg}`)
  );

  const relPath = path.relative(process.cwd(), emission.filePath);
  console.log(chalk.gray(`   ${relPath}:${emission.line}${emission.context ? ` in ${emission.context}()` : ''}`));

  if (!handler) {
    console.log(chalk.yellow('   → no handler found in update()'));
  } else {
    for (const mutation of handler.stateMutations) {
      console.log(chalk.green(`   → ${mutation.target}`) + chalk.gray(` [${mutation.mutationType}]`));
    }
  }

  console.log();
}

function displayFlow(flow: UiFlow, index: number, showCode: boolean) {
  console.log(
    chalk.cyan(`${index + 1}. ${describeElement(flow)}`) +
      chalk.yellow(` → .${flow.action.actionType}()`)
  );

  const relPath = path.relative(process.cwd(), flow.action.filePath);
  console.log(chalk.gray(`   ${relPath}:${flow.action.line}${flow.context ? ` in ${flow.context}()` : ''}`));

  for (const mutation of flow.stateMutations) {
    console.log(chalk.green(`   → ${mutation.target}`) + chalk.gray(` [${mutation.mutationType}]`));
  }

  if (showCode) {
    const codeFrame = generateCodeFrame(flow.action.filePath, flow.action.line);
    if (codeFrame) {
      const indentedFrame = codeFrame
        .split('\n')
        .map((line) => `     ${line}`)
        .join('\n');
      console.log(indentedFrame);
    }
  }

  console.log();
}

function formatResults(results: DetectionResults, compact?: boolean, showCode = true) {
  const { flows, teaFlows, skippedFiles, summary } = results;

  if (compact) {
    flows.forEach((flow) => displayCompactFlow(flow));
    teaFlows.forEach((teaFlow) => displayCompactTeaFlow(teaFlow));
    const total = flows.length + teaFlows.length;
    if (total > 0) {
      console.log(chalk.gray(`\n${total} flow(s) found`));
    }
    return;
  }

  if (flows.length === 0) {
    console.log(chalk.yellow('\nNo UI flows found.'));
    console.log(chalk.gray('Flows are detected for patterns like:'));
    console.log(chalk.gray("  if (ui.button('x').clicked()) { state.y = z; }"));
    console.log(chalk.gray("  const r = ui.button('x'); if (r.clicked()) { ... }"));
  } else {
    console.log(chalk.blue(`\nFound ${flows.length} UI flow(s):\n`));
    flows.forEach((flow, index) => displayFlow(flow, index, showCode));
  }

  if (teaFlows.length > 0) {
    console.log(chalk.blue(`\nFound ${teaFlows.length} message flow(s):\n`));
    teaFlows.forEach((teaFlow, index) => displayTeaFlow(teaFlow, index));
  }

  if (skippedFiles.length > 0) {
    console.log(chalk.yellow(`\nSkipped ${skippedFiles.length} file(s) that could not be parsed:`));
    for (const file of skippedFiles) {
      console.log(chalk.gray(`  ${path.relative(process.cwd(), file)}`));
    }
  }

  console.log(chalk.blue('\nSummary:'));
  console.log(chalk.gray(`Files analyzed: ${summary.filesAnalyzed}`));
  console.log(chalk.gray(`Flows found: ${summary.flowsFound}`));
  console.log(chalk.gray(`Message flows: ${summary.teaFlows}`));
  console.log(chalk.gray(`UI elements: ${summary.uiElements}`));
  console.log(chalk.gray(`Actions: ${summary.actions}`));
  console.log(chalk.gray(`State mutations: ${summary.stateMutations}`));
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('ui-flow')
    .description('Extract UI element → action → state mutation flows from immediate-mode UI code')
    .version('0.1.0')
    .argument('<path>', 'Path to a project directory or a single file to analyze')
    .option('-p, --pattern <pattern>', 'Glob pattern for files to analyze', DEFAULT_PATTERN)
    .option('-i, --ignore <patterns...>', 'Patterns to ignore', DEFAULT_IGNORE)
    .option('--json', 'Output results as JSON')
    .option('--mermaid', 'Output a Mermaid flowchart of every flow')
    .option('--inventory', 'Output a Mermaid graph of every UI element, action and state mutation')
    .option('--summary', 'Output a layered Mermaid summary (UI / Action / State)')
    .option('--compact', 'Compact output format (one line per flow)')
    .option('--no-color', 'Disable colored output')
    .option('--no-code', 'Do not show source excerpts')
    .action(async (targetPath: string, options: CliOptions) => {
      try {
        if (options.color === false) {
          chalk.level = 0;
        }

        const absolutePath = path.resolve(targetPath);

        if (!fs.existsSync(absolutePath)) {
          console.error(chalk.red(`Error: Path "${absolutePath}" does not exist`));
          process.exitCode = 1;
          return;
        }

        const machineReadable =
          options.json || options.mermaid || options.inventory || options.summary;
        if (!machineReadable) {
          console.log(chalk.blue(`Analyzing UI flows in: ${absolutePath}`));
          console.log(chalk.gray(`Pattern: ${options.pattern}`));
        }

        const results = await detectUiFlows(absolutePath, {
          pattern: options.pattern,
          ignore: options.ignore,
        });

        if (options.json) {
          console.log(JSON.stringify(results, null, 2));
        } else if (options.mermaid) {
          console.log(generateFlowMermaid(results));
        } else if (options.inventory) {
          console.log(
            generateMermaid({
              uiElements: results.files.flatMap((file) => file.uiElements),
              actions: results.files.flatMap((file) => file.actions),
              stateMutations: results.files.flatMap((file) => file.stateMutations),
            })
          );
        } else if (options.summary) {
          console.log(generateSummaryMermaid(results.files));
        } else {
          formatResults(results, options.compact, options.code !== false);
        }
      } catch (error) {
        console.error(chalk.red('Error:'), error);
        process.exitCode = 1;
      }
    });

  // Init command to generate default config file
  program
    .command('init')
    .description('Generate a default uiflow.config.json configuration file')
    .action(() => {
      const configPath = path.join(process.cwd(), 'uiflow.config.json');

      if (fs.existsSync(configPath)) {
        console.log(chalk.yellow(`Config file already exists: ${configPath}`));
        console.log(chalk.gray('Delete it first if you want to regenerate.'));
        process.exitCode = 1;
        return;
      }

      fs.writeFileSync(configPath, JSON.stringify(DEFAULT_CONFIG, null, 2) + '\n');
      console.log(chalk.green(`Created ${configPath}`));
      console.log(chalk.gray('\nConfiguration options:'));
      console.log(chalk.gray('  uiMethods: Extra methods that construct UI elements'));
      console.log(chalk.gray('  actionMethods: Extra methods that query actions (clicked, ...)'));
      console.log(chalk.gray('  mutatingMethods: Extra methods that mutate their receiver'));
      console.log(chalk.gray('  ignore: Additional patterns to ignore'));
      console.log(chalk.gray('  includeUnresolved: Keep flows whose UI element is unknown'));
    });

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error(chalk.red('Error:'), error);
      process.exitCode = 1;
    });
}
