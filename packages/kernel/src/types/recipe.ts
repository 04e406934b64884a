/**
 * Slipway Kernel — Recipe Types
 *
 * An ImageRecipe is the immutable input to every pipeline operation. It names
 * the base image, the runtime flags fixed into the image environment, the
 * restricted identity the entrypoint runs as, the dependency manifest and
 * installer, the source-copy ignore rules, and the default command.
 *
 * Recipes are validated once at the boundary (recipe/validator.ts). Code past
 * that boundary trusts the fields.
 */

// ---------------------------------------------------------------------------
// Runtime Flags
// ---------------------------------------------------------------------------

/**
 * Process-wide interpreter flags applied before any process starts.
 *
 * These are threaded explicitly into the plan (ENV instruction) and into the
 * container launch call. No code reads them from ambient process state.
 */
export interface RuntimeFlags {
  /** Flush stdout/stderr immediately (PYTHONUNBUFFERED=1). */
  readonly unbuffered: boolean;
  /** Never write bytecode cache files (PYTHONDONTWRITEBYTECODE=1). */
  readonly noBytecodeCache: boolean;
  /** Additional fixed environment entries. */
  readonly extraEnv: Readonly<Record<string, string>>;
}

// ---------------------------------------------------------------------------
// Recipe Sections
// ---------------------------------------------------------------------------

/** The restricted system account. Created once, never deleted. */
export interface IdentitySpec {
  readonly group: string;
  readonly user: string;
}

export interface DependencySpec {
  /** Manifest path relative to the build context, e.g. `requirements.txt`. */
  readonly manifest: string;
  /**
   * Installer argv prefix. The manifest filename is appended as the last
   * argument when the install step runs.
   */
  readonly installer: ReadonlyArray<string>;
}

export interface SourceSpec {
  /** dockerignore-style patterns excluded from the source copy. */
  readonly ignore: ReadonlyArray<string>;
}

/**
 * A complete, validated image recipe.
 */
export interface ImageRecipe {
  readonly base: string;
  readonly runtime: RuntimeFlags;
  /** Absolute POSIX path inside the image. */
  readonly workdir: string;
  readonly identity: IdentitySpec;
  readonly dependencies: DependencySpec;
  readonly source: SourceSpec;
  /** Interpreter + entry file. Never empty. */
  readonly entrypoint: ReadonlyArray<string>;
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_IGNORE: ReadonlyArray<string> = [
  '.git',
  '.env',
  '.venv',
  '**/__pycache__',
  '**/*.pyc',
  '**/*.pyo',
  'Dockerfile',
  '.dockerignore',
  'slipway.json',
];

export const DEFAULT_RECIPE: ImageRecipe = {
  base: 'python:3.11-slim',
  runtime: {
    unbuffered: true,
    noBytecodeCache: true,
    extraEnv: {},
  },
  workdir: '/app',
  identity: { group: 'app', user: 'app' },
  dependencies: {
    manifest: 'requirements.txt',
    installer: ['pip', 'install', '--no-cache-dir', '-r'],
  },
  source: { ignore: DEFAULT_IGNORE },
  entrypoint: ['python', 'main.py'],
};

// ---------------------------------------------------------------------------
// Validation Results
// ---------------------------------------------------------------------------

export interface ValidationError {
  /** Dotted path of the offending field, e.g. `identity.user`. */
  readonly field: string;
  readonly message: string;
}

export type ValidationResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly errors: ReadonlyArray<ValidationError> };
