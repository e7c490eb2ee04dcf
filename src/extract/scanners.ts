/**
 * Scanners over disassembled (smali) interface stubs.
 *
 * Three named stages, each producing typed records:
 *   - field declarations:  `.field public static final TRANSACTION_<name>:I = 0x<hex>`
 *   - method blocks:       `.method public <name>(<params>)<ret>` through the prologue marker
 *   - parameter names:     `.param p1, "<name>"` lines inside a method block
 */

export const DEFAULT_PROLOGUE_MARKER = ".prologue";

export interface FieldDeclaration {
  /** Identifier after the TRANSACTION_ prefix */
  name: string;
  number: number;
  /** 1-based line in the stub file */
  line: number;
}

export interface MethodBlock {
  name: string;
  /** First line of the block, trimmed */
  signatureLine: string;
  /** Lines after the signature up to and including the prologue marker */
  body: string[];
  startLine: number;
}

export interface MethodSignature {
  /** Raw parameter descriptor, e.g. "Landroid/content/Intent;I" */
  arguments: string;
  /** Raw return descriptor, e.g. "I" */
  returns: string;
}

const FIELD_DECLARATION_RE =
  /^\s*\.field\s+(?:[a-z]+\s+)*?static\s+final\s+(?:[a-z]+\s+)*?TRANSACTION_([A-Za-z0-9_$]+):I\s*=\s*(-?0x[0-9a-fA-F]+)\s*$/;

const PARAM_ANNOTATION_RE = /^\s*\.param\s+[pv]\d+\s*,\s*"([^"]*)"/;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Parse a smali hex literal. Negative values keep their sign.
 */
export function parseHexLiteral(literal: string): number {
  const negative = literal.startsWith("-");
  const digits = literal.replace(/^-?0x/i, "");
  const value = parseInt(digits, 16);
  return negative ? -value : value;
}

/**
 * Stage 1: every TRANSACTION_ int field in file order. Duplicates are kept.
 */
export function scanFieldDeclarations(stubText: string): FieldDeclaration[] {
  const fields: FieldDeclaration[] = [];
  const lines = stubText.split(/\r?\n/);

  lines.forEach((line, index) => {
    const match = FIELD_DECLARATION_RE.exec(line);
    if (match?.[1] && match[2]) {
      fields.push({ name: match[1], number: parseHexLiteral(match[2]), line: index + 1 });
    }
  });

  return fields;
}

/**
 * Stage 2: the block of public method `name` in the proxy text, from its
 * declaration line through the first prologue marker line. The marker must
 * appear before the method's `.end method`; null otherwise.
 */
export function scanMethodBlock(
  proxyText: string,
  name: string,
  prologueMarker: string = DEFAULT_PROLOGUE_MARKER
): MethodBlock | null {
  const pattern = new RegExp(
    `^[ \\t]*\\.method[ \\t]+public[ \\t]+(?:[a-z]+[ \\t]+)*?${escapeRegExp(name)}\\(` +
      `(?:(?!^[ \\t]*\\.end[ \\t]+method\\b).)*?` +
      `^[ \\t]*${escapeRegExp(prologueMarker)}[ \\t\\r]*$`,
    "ms"
  );
  const match = pattern.exec(proxyText);
  if (!match) {
    return null;
  }

  const blockLines = match[0].split(/\r?\n/);
  const startLine = proxyText.slice(0, match.index).split("\n").length;
  const [first = "", ...rest] = blockLines;

  return {
    name,
    signatureLine: first.trim(),
    body: rest.map((l) => l.trim()),
    startLine,
  };
}

/**
 * Strip `.method` and its modifiers plus the method name, then split the
 * remaining `(params)ret` at the first closing parenthesis.
 */
export function parseMethodSignature(block: MethodBlock): MethodSignature {
  const declaration = block.signatureLine.replace(/^\.method\s+(?:[a-z]+\s+)*/, "");
  const raw = declaration.startsWith(block.name) ? declaration.slice(block.name.length) : declaration;

  const close = raw.indexOf(")");
  if (close === -1) {
    return { arguments: raw.replace(/^\(/, ""), returns: "" };
  }

  return {
    arguments: raw.slice(0, close).replace(/^\(/, ""),
    returns: raw.slice(close + 1).trim(),
  };
}

/**
 * Stage 3: quoted parameter names in declaration order.
 */
export function scanParameterNames(block: MethodBlock): string[] {
  const names: string[] = [];
  for (const line of block.body) {
    const match = PARAM_ANNOTATION_RE.exec(line);
    if (match?.[1] !== undefined) {
      names.push(match[1]);
    }
  }
  return names;
}
