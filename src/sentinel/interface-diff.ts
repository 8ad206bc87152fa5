// Structural interface diff.
// Purpose: compare the top-level declarations of one file before and after a sentinel run.
// Fingerprints are printed without comments or bodies, so formatting and comment edits never register.

import path from "node:path";

import ts from "typescript";

import type { InterfaceLanguage, InterfaceReport } from "./types.js";

export type InterfaceDiffInput = {
  path: string;
  before: string | null;
  after: string | null;
};

type SymbolTable = Map<string, string>;

const TYPESCRIPT_EXTENSIONS = new Set([".ts", ".tsx", ".mts", ".cts", ".js", ".jsx", ".mjs", ".cjs"]);
const PYTHON_EXTENSIONS = new Set([".py", ".pyi"]);

// =============================================================================
// PUBLIC API
// =============================================================================

export function detectInterfaceLanguage(filePath: string): InterfaceLanguage {
  const ext = path.extname(filePath).toLowerCase();
  if (filePath.toLowerCase().endsWith(".d.ts") || TYPESCRIPT_EXTENSIONS.has(ext)) {
    return "typescript";
  }
  if (PYTHON_EXTENSIONS.has(ext)) return "python";
  return "unsupported";
}

export function computeInterfaceReport(input: InterfaceDiffInput): InterfaceReport {
  const language = detectInterfaceLanguage(input.path);
  if (language === "unsupported") {
    return emptyReport(input.path, language);
  }

  const extract = language === "typescript" ? extractTypeScriptSymbols : extractPythonSymbols;
  const before = input.before === null ? new Map<string, string>() : extract(input.path, input.before);
  const after = input.after === null ? new Map<string, string>() : extract(input.path, input.after);

  return diffSymbolTables(input.path, language, before, after);
}

export function countInterfaceChanges(reports: InterfaceReport[]): number {
  return reports.reduce(
    (total, report) =>
      total +
      report.symbols_added.length +
      report.symbols_removed.length +
      report.symbols_changed.length,
    0,
  );
}

// =============================================================================
// TYPESCRIPT / JAVASCRIPT
// =============================================================================

const printer = ts.createPrinter({ removeComments: true, newLine: ts.NewLineKind.LineFeed });

export function extractTypeScriptSymbols(filePath: string, text: string): SymbolTable {
  const sourceFile = ts.createSourceFile(
    filePath,
    text,
    ts.ScriptTarget.Latest,
    false,
    resolveScriptKind(filePath),
  );
  const symbols: SymbolTable = new Map();
  const print = (node: ts.Node): string =>
    printer.printNode(ts.EmitHint.Unspecified, node, sourceFile);

  for (const statement of sourceFile.statements) {
    if (ts.isFunctionDeclaration(statement)) {
      const stripped = ts.factory.updateFunctionDeclaration(
        statement,
        statement.modifiers,
        statement.asteriskToken,
        statement.name,
        statement.typeParameters,
        statement.parameters,
        statement.type,
        undefined,
      );
      addSymbol(symbols, statement.name?.text ?? "default", print(stripped));
      continue;
    }

    if (ts.isClassDeclaration(statement)) {
      const stripped = ts.factory.updateClassDeclaration(
        statement,
        statement.modifiers,
        statement.name,
        statement.typeParameters,
        statement.heritageClauses,
        stripClassMembers(statement.members),
      );
      addSymbol(symbols, statement.name?.text ?? "default", print(stripped));
      continue;
    }

    if (
      ts.isInterfaceDeclaration(statement) ||
      ts.isTypeAliasDeclaration(statement) ||
      ts.isEnumDeclaration(statement)
    ) {
      addSymbol(symbols, statement.name.text, print(statement));
      continue;
    }

    if (ts.isVariableStatement(statement) && isExportedStatement(statement)) {
      for (const declaration of statement.declarationList.declarations) {
        if (!ts.isIdentifier(declaration.name)) continue;

        const single = ts.factory.createVariableStatement(
          statement.modifiers,
          ts.factory.createVariableDeclarationList(
            [
              ts.factory.updateVariableDeclaration(
                declaration,
                declaration.name,
                declaration.exclamationToken,
                declaration.type,
                stripInitializer(declaration.initializer),
              ),
            ],
            statement.declarationList.flags,
          ),
        );
        addSymbol(symbols, declaration.name.text, print(single));
      }
    }
  }

  return symbols;
}

function stripClassMembers(members: ts.NodeArray<ts.ClassElement>): ts.ClassElement[] {
  const kept: ts.ClassElement[] = [];

  for (const member of members) {
    if (isPrivateMember(member) || ts.isClassStaticBlockDeclaration(member)) continue;

    if (ts.isMethodDeclaration(member)) {
      kept.push(
        ts.factory.updateMethodDeclaration(
          member,
          member.modifiers,
          member.asteriskToken,
          member.name,
          member.questionToken,
          member.typeParameters,
          member.parameters,
          member.type,
          undefined,
        ),
      );
    } else if (ts.isConstructorDeclaration(member)) {
      kept.push(ts.factory.updateConstructorDeclaration(member, member.modifiers, member.parameters, undefined));
    } else if (ts.isPropertyDeclaration(member)) {
      kept.push(
        ts.factory.updatePropertyDeclaration(
          member,
          member.modifiers,
          member.name,
          member.questionToken ?? member.exclamationToken,
          member.type,
          undefined,
        ),
      );
    } else if (ts.isGetAccessorDeclaration(member)) {
      kept.push(
        ts.factory.updateGetAccessorDeclaration(
          member,
          member.modifiers,
          member.name,
          member.parameters,
          member.type,
          undefined,
        ),
      );
    } else if (ts.isSetAccessorDeclaration(member)) {
      kept.push(
        ts.factory.updateSetAccessorDeclaration(member, member.modifiers, member.name, member.parameters, undefined),
      );
    } else {
      kept.push(member);
    }
  }

  return kept;
}

// Function-valued initializers keep their signature; every other initializer is dropped.
function stripInitializer(initializer: ts.Expression | undefined): ts.Expression | undefined {
  if (!initializer) return undefined;

  if (ts.isArrowFunction(initializer)) {
    return ts.factory.updateArrowFunction(
      initializer,
      initializer.modifiers,
      initializer.typeParameters,
      initializer.parameters,
      initializer.type,
      initializer.equalsGreaterThanToken,
      ts.factory.createBlock([]),
    );
  }

  if (ts.isFunctionExpression(initializer)) {
    return ts.factory.updateFunctionExpression(
      initializer,
      initializer.modifiers,
      initializer.asteriskToken,
      initializer.name,
      initializer.typeParameters,
      initializer.parameters,
      initializer.type,
      ts.factory.createBlock([]),
    );
  }

  return undefined;
}

function isPrivateMember(member: ts.ClassElement): boolean {
  if (member.name && ts.isPrivateIdentifier(member.name)) return true;
  if (!ts.canHaveModifiers(member)) return false;
  const modifiers = ts.getModifiers(member) ?? [];
  return modifiers.some((modifier) => modifier.kind === ts.SyntaxKind.PrivateKeyword);
}

function isExportedStatement(statement: ts.Statement): boolean {
  if (!ts.canHaveModifiers(statement)) return false;
  const modifiers = ts.getModifiers(statement) ?? [];
  return modifiers.some((modifier) => modifier.kind === ts.SyntaxKind.ExportKeyword);
}

function resolveScriptKind(filePath: string): ts.ScriptKind {
  switch (path.extname(filePath).toLowerCase()) {
    case ".tsx":
      return ts.ScriptKind.TSX;
    case ".jsx":
      return ts.ScriptKind.JSX;
    case ".js":
    case ".mjs":
    case ".cjs":
      return ts.ScriptKind.JS;
    default:
      return ts.ScriptKind.TS;
  }
}

// =============================================================================
// PYTHON
// =============================================================================

const PYTHON_HEADER = /^(?:async\s+def|def|class)\s+([A-Za-z_][A-Za-z0-9_]*)/;

// Top-level (column 0) def/class headers only. The fingerprint is the header up to
// its first ':' at bracket depth 0, so one-line bodies (`def a(): return 1`) stay out.
export function extractPythonSymbols(_filePath: string, text: string): SymbolTable {
  const symbols: SymbolTable = new Map();
  const lines = text.split(/\r?\n/);

  for (let index = 0; index < lines.length; index += 1) {
    const match = PYTHON_HEADER.exec(lines[index] ?? "");
    if (!match?.[1]) continue;

    const header = readPythonHeader(lines, index);
    index = header.end;

    const signature = header.text
      .replace(/\s+/g, " ")
      .replace(/\s*([(),:\[\]=])\s*/g, "$1")
      .replace(/,([)\]])/g, "$1")
      .trim();
    addSymbol(symbols, match[1], signature);
  }

  return symbols;
}

function readPythonHeader(lines: string[], start: number): { text: string; end: number } {
  const parts: string[] = [];
  let depth = 0;

  for (let cursor = start; cursor < lines.length; cursor += 1) {
    let taken = "";
    let quote: string | null = null;
    let escaped = false;

    for (const char of lines[cursor] ?? "") {
      if (quote) {
        taken += char;
        if (escaped) escaped = false;
        else if (char === "\\") escaped = true;
        else if (char === quote) quote = null;
        continue;
      }
      if (char === "#") break;

      taken += char;
      if (char === "'" || char === '"') {
        quote = char;
      } else if ("([{".includes(char)) {
        depth += 1;
      } else if (")]}".includes(char)) {
        depth -= 1;
      } else if (char === ":" && depth <= 0) {
        parts.push(taken);
        return { text: parts.join(" "), end: cursor };
      }
    }
    parts.push(taken);
  }

  return { text: parts.join(" "), end: lines.length - 1 };
}

// =============================================================================
// INTERNALS
// =============================================================================

function addSymbol(symbols: SymbolTable, name: string, fingerprint: string): void {
  // Overloads and redeclarations share one entry.
  const existing = symbols.get(name);
  symbols.set(name, existing === undefined ? fingerprint : `${existing}\n${fingerprint}`);
}

function diffSymbolTables(
  filePath: string,
  language: InterfaceLanguage,
  before: SymbolTable,
  after: SymbolTable,
): InterfaceReport {
  const added: string[] = [];
  const removed: string[] = [];
  const changed: string[] = [];

  for (const [name, fingerprint] of after) {
    const previous = before.get(name);
    if (previous === undefined) {
      added.push(name);
    } else if (previous !== fingerprint) {
      changed.push(name);
    }
  }
  for (const name of before.keys()) {
    if (!after.has(name)) removed.push(name);
  }

  return {
    path: filePath,
    language,
    symbols_added: added.sort(),
    symbols_removed: removed.sort(),
    symbols_changed: changed.sort(),
  };
}

function emptyReport(filePath: string, language: InterfaceLanguage): InterfaceReport {
  return {
    path: filePath,
    language,
    symbols_added: [],
    symbols_removed: [],
    symbols_changed: [],
  };
}
