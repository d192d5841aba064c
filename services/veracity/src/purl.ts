import type { PackageIdentity } from "./types.js";

export const CRATE_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;
export const CRATE_VERSION_PATTERN = /^[0-9][0-9A-Za-z.+-]*$/;
export const PACKAGE_URL_PATTERN = /^pkg:cargo\/([A-Za-z0-9_-]+)@([0-9][0-9A-Za-z.+-]*)$/;

export class InvalidPackageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidPackageError";
  }
}

export function packageIdentity(name: string, version: string): PackageIdentity {
  if (!CRATE_NAME_PATTERN.test(name)) {
    throw new InvalidPackageError(`invalid crate name: ${name}`);
  }
  if (!CRATE_VERSION_PATTERN.test(version)) {
    throw new InvalidPackageError(`invalid version for ${name}: ${version}`);
  }
  return Object.freeze({ name, version });
}

export function toPackageUrl(identity: PackageIdentity): string {
  return `pkg:cargo/${identity.name}@${identity.version}`;
}

export function parsePackageUrl(value: string): PackageIdentity {
  const match = PACKAGE_URL_PATTERN.exec(value.trim());
  if (!match) {
    throw new InvalidPackageError(`not a cargo package url: ${value}`);
  }
  const [, name, version] = match;
  return packageIdentity(name, version);
}

export function samePackage(left: PackageIdentity, right: PackageIdentity): boolean {
  return left.name === right.name && left.version === right.version;
}

/** Keeps the first occurrence of every identity, in input order. */
export function uniquePackages(identities: Iterable<PackageIdentity>): PackageIdentity[] {
  const seen = new Map<string, PackageIdentity>();
  for (const identity of identities) {
    const key = toPackageUrl(identity);
    if (!seen.has(key)) {
      seen.set(key, identity);
    }
  }
  return Array.from(seen.values());
}
