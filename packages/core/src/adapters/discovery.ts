/**
 * TypeScript discovery adapter
 *
 * Parses source files with the TypeScript compiler API and returns the
 * exported functions and public methods of exported classes.
 */

import { readdir, readFile, stat } from 'node:fs/promises';
import path from 'node:path';

import ts from 'typescript';

import { EXCLUDED_DIRECTORIES, SOURCE_EXTENSIONS } from '../constants.js';
import { DiscoveryError, toError } from '../errors.js';
import { logger as defaultLogger, type Logger } from '../logging/logger.js';
import type { DocumentableUnit } from '../types/index.js';
import type { DiscoverOptions, DiscoveryAdapter } from './types.js';

const EXCLUDED_DIRECTORY_SET = new Set<string>(EXCLUDED_DIRECTORIES);

/** Compiled-extension imports map back to their sources */
const EMITTED_TO_SOURCE: Record<string, string[]> = {
  '.js': ['.ts', '.tsx'],
  '.jsx': ['.tsx'],
  '.mjs': ['.mts'],
  '.cjs': ['.cts'],
};

export function isSourceFile(fileName: string): boolean {
  if (fileName.endsWith('.d.ts') || /\.(test|spec)\.[cm]?tsx?$/.test(fileName)) {
    return false;
  }
  return SOURCE_EXTENSIONS.some((extension) => fileName.endsWith(extension));
}

/**
 * Whether any directory segment of a root-relative path is excluded
 */
export function isInExcludedDirectory(relativePath: string): boolean {
  return relativePath.split(/[\\/]/).some((segment) => EXCLUDED_DIRECTORY_SET.has(segment));
}

function isPublicName(name: string): boolean {
  return !name.startsWith('_');
}

function hasModifier(node: ts.Node, kind: ts.SyntaxKind): boolean {
  return ts.canHaveModifiers(node) && (ts.getModifiers(node) ?? []).some((m) => m.kind === kind);
}

function isExported(node: ts.Node): boolean {
  return hasModifier(node, ts.SyntaxKind.ExportKeyword);
}

/**
 * Main text of the closest JSDoc block, tags excluded
 */
function readDocstring(node: ts.Node): string | null {
  const blocks = ts.getJSDocCommentsAndTags(node).filter(ts.isJSDoc);
  const last = blocks[blocks.length - 1];
  const text = last ? ts.getTextOfJSDocComment(last.comment)?.trim() : undefined;
  return text ? text : null;
}

function printSignature(
  name: string,
  fn: ts.SignatureDeclarationBase,
  sourceFile: ts.SourceFile
): string {
  const typeParameters = fn.typeParameters?.length
    ? `<${fn.typeParameters.map((p) => p.getText(sourceFile)).join(', ')}>`
    : '';
  const parameters = fn.parameters.map((p) => p.getText(sourceFile)).join(', ');
  const returnType = fn.type ? `: ${fn.type.getText(sourceFile)}` : '';
  return `${name}${typeParameters}(${parameters})${returnType}`;
}

export interface TypeScriptDiscoveryAdapterOptions {
  logger?: Logger;
}

export class TypeScriptDiscoveryAdapter implements DiscoveryAdapter {
  private readonly log: Logger;

  constructor(options: TypeScriptDiscoveryAdapterOptions = {}) {
    this.log = (options.logger ?? defaultLogger).child({ component: 'discovery' });
  }

  /**
   * @throws {DiscoveryError} if `root` is not a directory
   */
  async discover(root: string, options?: DiscoverOptions): Promise<DocumentableUnit[]> {
    const absoluteRoot = path.resolve(root);
    const info = await stat(absoluteRoot).catch(() => null);
    if (!info?.isDirectory()) {
      throw new DiscoveryError(`Discovery root not found: ${root}`, root);
    }

    const files = await this.collectFiles(absoluteRoot, options);
    const units: DocumentableUnit[] = [];

    for (const file of files) {
      options?.signal?.throwIfAborted();

      let text: string;
      try {
        text = await readFile(file, 'utf8');
      } catch (error) {
        this.log.warn('Skipping unreadable file', { file, error: toError(error).message });
        continue;
      }

      const sourceFile = ts.createSourceFile(
        file,
        text,
        ts.ScriptTarget.Latest,
        true,
        file.endsWith('.tsx') ? ts.ScriptKind.TSX : ts.ScriptKind.TS
      );
      const dependencies = await this.resolveLocalImports(sourceFile);
      const moduleId = path
        .relative(absoluteRoot, file)
        .split(path.sep)
        .join('/')
        .replace(/\.[cm]?tsx?$/, '');

      for (const found of this.extractUnits(sourceFile)) {
        units.push({ ...found, module: moduleId, sourcePath: file, dependencies: [...dependencies] });
      }
    }

    this.log.info('Discovery complete', { root: absoluteRoot, files: files.length, units: units.length });
    return units;
  }

  // ==========================================================================
  // File collection
  // ==========================================================================

  private async collectFiles(root: string, options?: DiscoverOptions): Promise<string[]> {
    const restrictTo = options?.paths?.length ? options.paths : null;
    if (!restrictTo) {
      return this.walk(root, options?.signal);
    }

    const files = new Set<string>();
    for (const relative of restrictTo) {
      const target = path.resolve(root, relative);
      const fromRoot = path.relative(root, target);
      if (fromRoot.startsWith('..') || path.isAbsolute(fromRoot)) {
        this.log.error('Skipping path outside the discovery root', undefined, { root, path: relative });
        continue;
      }
      if (isInExcludedDirectory(fromRoot)) {
        this.log.warn('Skipping path inside an excluded directory', { root, path: relative });
        continue;
      }

      const info = await stat(target).catch(() => null);
      if (info?.isDirectory()) {
        for (const file of await this.walk(target, options?.signal)) {
          files.add(file);
        }
      } else if (info?.isFile() && isSourceFile(target)) {
        files.add(target);
      } else {
        this.log.warn('Configured path has no source files', { root, path: relative });
      }
    }
    return [...files];
  }

  /**
   * Depth-first, entries sorted by name so discovery order is stable
   */
  private async walk(dir: string, signal?: AbortSignal): Promise<string[]> {
    signal?.throwIfAborted();

    const entries = await readdir(dir, { withFileTypes: true });
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    const files: string[] = [];
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (!EXCLUDED_DIRECTORY_SET.has(entry.name)) {
          files.push(...(await this.walk(fullPath, signal)));
        }
      } else if (entry.isFile() && isSourceFile(entry.name)) {
        files.push(fullPath);
      }
    }
    return files;
  }

  // ==========================================================================
  // Extraction
  // ==========================================================================

  private extractUnits(
    sourceFile: ts.SourceFile
  ): Array<Pick<DocumentableUnit, 'name' | 'kind' | 'docstring' | 'signature'>> {
    const found: Array<Pick<DocumentableUnit, 'name' | 'kind' | 'docstring' | 'signature'>> = [];

    for (const statement of sourceFile.statements) {
      if (!isExported(statement)) {
        continue;
      }

      if (ts.isFunctionDeclaration(statement)) {
        // Overload signatures have no body; the implementation is reported once
        if (!statement.name || !statement.body || !isPublicName(statement.name.text)) {
          continue;
        }
        found.push({
          name: statement.name.text,
          kind: 'function',
          docstring: readDocstring(statement),
          signature: printSignature(statement.name.text, statement, sourceFile),
        });
      } else if (ts.isVariableStatement(statement)) {
        for (const declaration of statement.declarationList.declarations) {
          const initializer = declaration.initializer;
          if (
            !ts.isIdentifier(declaration.name) ||
            !initializer ||
            !(ts.isArrowFunction(initializer) || ts.isFunctionExpression(initializer)) ||
            !isPublicName(declaration.name.text)
          ) {
            continue;
          }
          found.push({
            name: declaration.name.text,
            kind: 'function',
            docstring: readDocstring(statement),
            signature: printSignature(declaration.name.text, initializer, sourceFile),
          });
        }
      } else if (ts.isClassDeclaration(statement) && statement.name) {
        const className = statement.name.text;
        for (const member of statement.members) {
          if (
            !ts.isMethodDeclaration(member) ||
            !member.body ||
            !ts.isIdentifier(member.name) ||
            !isPublicName(member.name.text) ||
            hasModifier(member, ts.SyntaxKind.PrivateKeyword) ||
            hasModifier(member, ts.SyntaxKind.ProtectedKeyword)
          ) {
            continue;
          }
          const name = `${className}.${member.name.text}`;
          found.push({
            name,
            kind: 'method',
            docstring: readDocstring(member),
            signature: printSignature(name, member, sourceFile),
          });
        }
      }
    }

    return found;
  }

  /**
   * Absolute paths of the local files this file imports or re-exports
   */
  private async resolveLocalImports(sourceFile: ts.SourceFile): Promise<string[]> {
    const dir = path.dirname(sourceFile.fileName);
    const resolved = new Set<string>();

    for (const statement of sourceFile.statements) {
      if (!ts.isImportDeclaration(statement) && !ts.isExportDeclaration(statement)) {
        continue;
      }
      const specifier = statement.moduleSpecifier;
      if (!specifier || !ts.isStringLiteral(specifier) || !specifier.text.startsWith('.')) {
        continue;
      }

      const target = await resolveModule(path.resolve(dir, specifier.text));
      if (target) {
        resolved.add(target);
      }
    }

    return [...resolved];
  }
}

/**
 * Map an import target to an existing source file, or null
 */
async function resolveModule(base: string): Promise<string | null> {
  const extension = path.extname(base);
  const stem = base.slice(0, base.length - extension.length);

  const candidates = [
    ...(EMITTED_TO_SOURCE[extension] ?? []).map((sourceExtension) => stem + sourceExtension),
    base,
    ...SOURCE_EXTENSIONS.map((sourceExtension) => base + sourceExtension),
    ...SOURCE_EXTENSIONS.map((sourceExtension) => path.join(base, `index${sourceExtension}`)),
  ];

  for (const candidate of candidates) {
    const info = await stat(candidate).catch(() => null);
    if (info?.isFile()) {
      return candidate;
    }
  }
  return null;
}
