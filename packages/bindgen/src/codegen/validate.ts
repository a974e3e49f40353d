/**
 * Structural check of a generated bindings file
 */

import { parse } from '@babel/parser';
import traverse from '@babel/traverse';
import { ErrorCode, NvrpcError, toError } from '@nvrpc/runtime';

export interface BindingsSummary {
  /** Exported async functions (the call stubs) */
  functions: string[];
  /** Exported classes (the handle kinds) */
  classes: string[];
  enums: string[];
  constants: string[];
}

/**
 * Parses generated TypeScript and lists what it exports.
 *
 * @throws NvrpcError with `BINDINGS_INVALID` when the source does not parse
 */
export function analyzeBindings(source: string, fileName = 'bindings.ts'): BindingsSummary {
  let ast: ReturnType<typeof parse>;
  try {
    ast = parse(source, {
      sourceType: 'module',
      sourceFilename: fileName,
      plugins: ['typescript'],
    });
  } catch (error) {
    const cause = toError(error);
    throw new NvrpcError(ErrorCode.BINDINGS_INVALID, `Cannot parse ${fileName}: ${cause.message}`, {
      context: { fileName },
      cause,
    });
  }

  const summary: BindingsSummary = { functions: [], classes: [], enums: [], constants: [] };

  traverse(ast, {
    ExportNamedDeclaration(nodePath) {
      const declaration = nodePath.node.declaration;
      if (!declaration) {
        return;
      }
      switch (declaration.type) {
        case 'FunctionDeclaration':
          if (declaration.id && declaration.async) {
            summary.functions.push(declaration.id.name);
          }
          break;
        case 'ClassDeclaration':
          if (declaration.id) {
            summary.classes.push(declaration.id.name);
          }
          break;
        case 'TSEnumDeclaration':
          summary.enums.push(declaration.id.name);
          break;
        case 'VariableDeclaration':
          for (const declarator of declaration.declarations) {
            if (declarator.id.type === 'Identifier') {
              summary.constants.push(declarator.id.name);
            }
          }
          break;
        default:
          break;
      }
    },
  });

  return summary;
}
