import { BaseVersion } from "./base-version.js";
import { FullVersion } from "./full-version.js";
import type { ComponentInput } from "./component.js";

/** Either a two- or a three-component version, discriminated by `kind`. */
export type Version = BaseVersion | FullVersion;

export type Variant = Version["kind"];

export function isVariant(version: Version, variant: Variant): boolean {
  return version.kind === variant;
}

export function patchOf(version: Version): bigint | undefined {
  return version.kind === "full" ? version.patch : undefined;
}

export function versionFromTuple(
  tuple:
    | readonly [ComponentInput, ComponentInput]
    | readonly [ComponentInput, ComponentInput, ComponentInput],
): Version {
  if (tuple.length === 2) {
    return BaseVersion.from(tuple);
  }
  return FullVersion.from(tuple);
}

/** Same shape and same components. `1.2` and `1.2.0` are not equal. */
export function versionsEqual(a: Version, b: Version): boolean {
  if (a.kind === "base" && b.kind === "base") return a.equals(b);
  if (a.kind === "full" && b.kind === "full") return a.equals(b);
  return false;
}

/**
 * Order two versions. A base version is compared as its lossy full form,
 * so `1.2` sorts equal to `1.2.0`.
 */
export function compareVersions(a: Version, b: Version): -1 | 0 | 1 {
  return toFull(a).compare(toFull(b));
}

function toFull(version: Version): FullVersion {
  return version.kind === "full" ? version : version.toFullVersionLossy();
}
