/**
 * Slipway Kernel — Package Versions
 *
 * Parses the package version scheme used by the installer (epoch, release,
 * pre-, post- and dev-release, local label) and decides whether an
 * installed version satisfies an `==` pin. Spelling variants are
 * normalized: `2.31` equals `2.31.0`, `1.0-alpha1` equals `1.0a1`, and a
 * local label on the installed version is ignored unless the pin has one.
 */

export interface PackageVersion {
  readonly epoch: number;
  /** Release segments with trailing zeros removed. */
  readonly release: ReadonlyArray<number>;
  /** Normalized pre-release, e.g. `a1`, `rc0`; empty when absent. */
  readonly pre: string;
  readonly post: number | null;
  readonly dev: number | null;
  readonly local: string | null;
}

const VERSION =
  /^v?(?:(\d+)!)?(\d+(?:\.\d+)*)(?:[-_.]?(a|alpha|b|beta|c|rc|pre|preview)[-_.]?(\d*))?(?:-(\d+)|[-_.]?(post|rev|r)[-_.]?(\d*))?(?:[-_.]?(dev)[-_.]?(\d*))?(?:\+([a-z0-9]+(?:[-_.][a-z0-9]+)*))?$/;

const PRE_LABELS: Readonly<Record<string, string>> = {
  a: 'a',
  alpha: 'a',
  b: 'b',
  beta: 'b',
  c: 'rc',
  rc: 'rc',
  pre: 'rc',
  preview: 'rc',
};

const number = (digits: string | undefined): number => (digits === undefined || digits === '' ? 0 : Number(digits));

/** Parse a version string; null when it does not follow the scheme. */
export function parseVersion(text: string): PackageVersion | null {
  const m = VERSION.exec(text.trim().toLowerCase());
  if (m === null) return null;
  const [, epoch, release, preLabel, preNum, implicitPost, postLabel, postNum, dev, devNum, local] = m;

  const segments = (release ?? '0').split('.').map(Number);
  while (segments.length > 1 && segments[segments.length - 1] === 0) segments.pop();

  let post: number | null = null;
  if (implicitPost !== undefined) post = number(implicitPost);
  else if (postLabel !== undefined) post = number(postNum);

  return {
    epoch: number(epoch),
    release: segments,
    pre: preLabel === undefined ? '' : `${PRE_LABELS[preLabel] ?? preLabel}${number(preNum)}`,
    post,
    dev: dev === undefined ? null : number(devNum),
    local: local === undefined ? null : local.replace(/[-_]/g, '.'),
  };
}

/**
 * Whether `installed` satisfies `==pinned`. Versions outside the scheme
 * are compared as strings.
 */
export function versionsMatch(pinned: string, installed: string): boolean {
  const want = parseVersion(pinned);
  const have = parseVersion(installed);
  if (want === null || have === null) return pinned.trim() === installed.trim();

  return (
    want.epoch === have.epoch &&
    want.release.length === have.release.length &&
    want.release.every((segment, i) => segment === have.release[i]) &&
    want.pre === have.pre &&
    want.post === have.post &&
    want.dev === have.dev &&
    (want.local === null || want.local === have.local)
  );
}
