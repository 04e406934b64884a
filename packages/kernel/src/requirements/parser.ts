/**
 * Slipway Kernel — Requirements Manifest Parser
 *
 * Parses the pip requirements format consumed by the dependency step.
 *
 * Supported syntax:
 *   - one requirement per logical line: `name[extras] spec(, spec)* ; marker`
 *   - direct references: `name @ url`
 *   - `#` comments (at line start or after whitespace) and blank lines
 *   - trailing `\` joins a line with the next
 *   - option lines beginning with `-` (`-r`, `-c`, `--index-url`, ...) are
 *     kept verbatim; the installer interprets them
 *
 * The parser checks syntax only. A well-formed entry naming a package that
 * does not exist is accepted here and fails at install time.
 *
 * Parse failures are never partial: any error yields no manifest.
 */

export type SpecifierOperator = '===' | '==' | '!=' | '~=' | '<=' | '>=' | '<' | '>';

export interface VersionSpecifier {
  readonly operator: SpecifierOperator;
  readonly version: string;
}

export interface Requirement {
  /** Name as written in the manifest. */
  readonly name: string;
  /** PEP 503 normalized name, used for comparisons. */
  readonly normalized: string;
  readonly extras: ReadonlyArray<string>;
  readonly specifiers: ReadonlyArray<VersionSpecifier>;
  readonly url: string | null;
  readonly marker: string | null;
  /** 1-based line number where the logical line starts. */
  readonly line: number;
}

export interface ManifestOption {
  readonly line: number;
  readonly text: string;
}

export interface RequirementsManifest {
  readonly requirements: ReadonlyArray<Requirement>;
  readonly options: ReadonlyArray<ManifestOption>;
}

export interface ManifestError {
  readonly line: number;
  readonly message: string;
}

export type RequirementsParseResult =
  | { readonly ok: true; readonly manifest: RequirementsManifest }
  | { readonly ok: false; readonly errors: ReadonlyArray<ManifestError> };

const NAME = /^[A-Za-z0-9](?:[A-Za-z0-9._-]*[A-Za-z0-9])?$/;
const HEAD = /^([A-Za-z0-9](?:[A-Za-z0-9._-]*[A-Za-z0-9])?)\s*(?:\[([^\]]*)\])?\s*(.*)$/;
const SPECIFIER = /^(===|==|!=|~=|<=|>=|<|>)\s*(\S+)$/;
const VERSION = /^[0-9A-Za-z][0-9A-Za-z.*+!_-]*$/;

/** PEP 503 name normalization: lowercase, runs of `-_.` collapse to `-`. */
export function normalizeName(name: string): string {
  return name.toLowerCase().replace(/[-_.]+/g, '-');
}

interface LogicalLine {
  readonly line: number;
  readonly text: string;
}

function logicalLines(source: string): LogicalLine[] {
  const physical = source.split(/\r?\n/);
  const out: LogicalLine[] = [];
  let buffer = '';
  let start = 0;
  for (let i = 0; i < physical.length; i++) {
    const text = physical[i] ?? '';
    if (buffer === '') start = i + 1;
    if (text.endsWith('\\')) {
      buffer += text.slice(0, -1);
      continue;
    }
    out.push({ line: start, text: buffer + text });
    buffer = '';
  }
  if (buffer !== '') out.push({ line: start, text: buffer });
  return out;
}

function stripComment(text: string): string {
  return text.replace(/(^|\s)#.*$/, '').trim();
}

/**
 * Parse requirements manifest source text.
 */
export function parseRequirements(source: string): RequirementsParseResult {
  const requirements: Requirement[] = [];
  const options: ManifestOption[] = [];
  const errors: ManifestError[] = [];

  for (const { line, text: rawText } of logicalLines(source)) {
    const text = stripComment(rawText);
    if (text === '') continue;

    if (text.startsWith('-')) {
      options.push({ line, text });
      continue;
    }

    const parsed = parseRequirementLine(text, line);
    if ('message' in parsed) {
      errors.push(parsed);
    } else {
      requirements.push(parsed);
    }
  }

  if (errors.length > 0) {
    return { ok: false, errors };
  }
  return { ok: true, manifest: { requirements, options } };
}

function parseRequirementLine(text: string, line: number): Requirement | ManifestError {
  const semi = text.indexOf(';');
  const body = (semi === -1 ? text : text.slice(0, semi)).trim();
  const marker = semi === -1 ? null : text.slice(semi + 1).trim() || null;

  const head = HEAD.exec(body);
  if (head === null) {
    return { line, message: `invalid requirement "${text}"` };
  }
  const name = head[1] ?? '';
  const extrasText = head[2];
  let rest = (head[3] ?? '').trim();

  const extras: string[] = [];
  if (extrasText !== undefined) {
    for (const extra of extrasText.split(',').map((e) => e.trim()).filter((e) => e !== '')) {
      if (!NAME.test(extra)) {
        return { line, message: `invalid extra "${extra}" for ${name}` };
      }
      extras.push(extra);
    }
  }

  if (rest.startsWith('@')) {
    const url = rest.slice(1).trim();
    if (url === '') {
      return { line, message: `direct reference for ${name} has no URL` };
    }
    return { name, normalized: normalizeName(name), extras, specifiers: [], url, marker, line };
  }

  if (rest.startsWith('(') && rest.endsWith(')')) {
    rest = rest.slice(1, -1).trim();
  }

  const specifiers: VersionSpecifier[] = [];
  if (rest !== '') {
    for (const part of rest.split(',').map((p) => p.trim())) {
      const spec = SPECIFIER.exec(part);
      if (spec === null) {
        return { line, message: `invalid version specifier "${part}" for ${name}` };
      }
      const operator = spec[1];
      const version = spec[2] ?? '';
      if (!isOperator(operator)) {
        return { line, message: `unknown operator in "${part}" for ${name}` };
      }
      // Arbitrary equality compares strings; every other operator needs a
      // version-shaped right-hand side.
      if (operator !== '===' && !VERSION.test(version)) {
        return { line, message: `invalid version "${version}" for ${name}` };
      }
      specifiers.push({ operator, version });
    }
  }

  return { name, normalized: normalizeName(name), extras, specifiers, url: null, marker, line };
}

function isOperator(value: string | undefined): value is SpecifierOperator {
  return (
    value === '===' ||
    value === '==' ||
    value === '!=' ||
    value === '~=' ||
    value === '<=' ||
    value === '>=' ||
    value === '<' ||
    value === '>'
  );
}

/**
 * Exact pins declared by the manifest, keyed by normalized name.
 *
 * Only `==` without wildcards and `===` count as pins. Requirements gated by
 * an environment marker are left out: whether they install depends on the
 * target platform, and markers are not evaluated here.
 */
export function pinnedVersions(manifest: RequirementsManifest): ReadonlyMap<string, VersionSpecifier> {
  const pins = new Map<string, VersionSpecifier>();
  for (const req of manifest.requirements) {
    if (req.marker !== null) continue;
    const pin = req.specifiers.find(
      (s) => s.operator === '===' || (s.operator === '==' && !s.version.includes('*')),
    );
    if (pin !== undefined) pins.set(req.normalized, pin);
  }
  return pins;
}
