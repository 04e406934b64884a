/**
 * Slipway Kernel — Image Reference Parsing
 *
 * Parses `[registry/]repository[:tag][@digest]` references and decides
 * whether a reference is pinned. A base must be pinned (a digest, or a tag
 * other than `latest`) so that rebuilding the same recipe resolves the same
 * filesystem snapshot.
 */

export interface ImageReference {
  readonly registry: string | null;
  readonly repository: string;
  readonly tag: string | null;
  readonly digest: string | null;
}

export type ImageReferenceResult =
  | { readonly ok: true; readonly ref: ImageReference }
  | { readonly ok: false; readonly message: string };

const COMPONENT = /^[a-z0-9]+(?:(?:[._]|__|-+)[a-z0-9]+)*$/;
const TAG = /^\w[\w.-]{0,127}$/;
const DIGEST = /^[a-z0-9]+(?:[.+_-][a-z0-9]+)*:[a-fA-F0-9]{32,}$/;

/**
 * A leading path component is a registry host when it contains a `.` or a
 * `:`, or is exactly `localhost`.
 */
function isRegistryHost(component: string): boolean {
  return component.includes('.') || component.includes(':') || component === 'localhost';
}

export function parseImageReference(input: string): ImageReferenceResult {
  const raw = input.trim();
  if (raw === '') {
    return { ok: false, message: 'image reference is empty' };
  }

  let rest = raw;
  let digest: string | null = null;
  const at = rest.indexOf('@');
  if (at !== -1) {
    digest = rest.slice(at + 1);
    rest = rest.slice(0, at);
    if (!DIGEST.test(digest)) {
      return { ok: false, message: `invalid digest "${digest}"` };
    }
  }

  // The tag separator is the last ':' after the last '/', so a registry
  // port (`host:5000/name`) is not mistaken for a tag.
  let tag: string | null = null;
  const lastSlash = rest.lastIndexOf('/');
  const colon = rest.indexOf(':', lastSlash + 1);
  if (colon !== -1) {
    tag = rest.slice(colon + 1);
    rest = rest.slice(0, colon);
    if (!TAG.test(tag)) {
      return { ok: false, message: `invalid tag "${tag}"` };
    }
  }

  const components = rest.split('/');
  let registry: string | null = null;
  const first = components[0];
  if (components.length > 1 && first !== undefined && isRegistryHost(first)) {
    registry = first;
    components.shift();
  }

  if (components.length === 0 || components.some((c) => !COMPONENT.test(c))) {
    return { ok: false, message: `invalid repository name "${components.join('/')}"` };
  }

  return {
    ok: true,
    ref: { registry, repository: components.join('/'), tag, digest },
  };
}

/** A reference is pinned when it carries a digest or a non-`latest` tag. */
export function isPinned(ref: ImageReference): boolean {
  if (ref.digest !== null) return true;
  return ref.tag !== null && ref.tag !== 'latest';
}

export function formatImageReference(ref: ImageReference): string {
  let out = ref.registry !== null ? `${ref.registry}/${ref.repository}` : ref.repository;
  if (ref.tag !== null) out += `:${ref.tag}`;
  if (ref.digest !== null) out += `@${ref.digest}`;
  return out;
}
