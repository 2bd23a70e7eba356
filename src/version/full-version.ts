import { compareComponents, toComponent, type ComponentInput } from "./component.js";
import { BaseVersion } from "./base-version.js";

/**
 * A three-component `MAJOR.MINOR.PATCH` version.
 *
 * A subset of semver: pre-release and build labels are never part of it.
 */
export class FullVersion {
  readonly kind = "full" as const;
  readonly major: bigint;
  readonly minor: bigint;
  readonly patch: bigint;

  constructor(major: ComponentInput, minor: ComponentInput, patch: ComponentInput) {
    this.major = toComponent(major, "major");
    this.minor = toComponent(minor, "minor");
    this.patch = toComponent(patch, "patch");
    Object.freeze(this);
  }

  static from(tuple: readonly [ComponentInput, ComponentInput, ComponentInput]): FullVersion {
    return new FullVersion(tuple[0], tuple[1], tuple[2]);
  }

  /** Lossy: the patch component is dropped. */
  toBaseVersionLossy(): BaseVersion {
    return new BaseVersion(this.major, this.minor);
  }

  equals(other: FullVersion): boolean {
    return (
      this.major === other.major &&
      this.minor === other.minor &&
      this.patch === other.patch
    );
  }

  compare(other: FullVersion): -1 | 0 | 1 {
    return (
      compareComponents(this.major, other.major) ||
      compareComponents(this.minor, other.minor) ||
      compareComponents(this.patch, other.patch)
    );
  }

  toTuple(): [bigint, bigint, bigint] {
    return [this.major, this.minor, this.patch];
  }

  toString(): string {
    return `${this.major}.${this.minor}.${this.patch}`;
  }

  toJSON(): { major: string; minor: string; patch: string } {
    return {
      major: this.major.toString(),
      minor: this.minor.toString(),
      patch: this.patch.toString(),
    };
  }
}
