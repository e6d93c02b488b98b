import * as parser from '@babel/parser';
import * as t from '@babel/types';
import * as fs from 'fs';

export interface ParsedFile {
  file: string;
  ast: t.File;
  content: string;
}

/**
 * Parse JavaScript/TypeScript source (JSX and TSX included).
 * Throws Babel's SyntaxError on malformed input.
 */
export function parseSource(content: string, filePath: string): ParsedFile {
  const ast = parser.parse(content, {
    sourceType: 'module',
    plugins: ['jsx', 'typescript'],
    sourceFilename: filePath,
  });

  return { file: filePath, ast, content };
}

export function parseFile(filePath: string): ParsedFile {
  const content = fs.readFileSync(filePath, 'utf-8');
  return parseSource(content, filePath);
}
