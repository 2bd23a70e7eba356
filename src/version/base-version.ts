import { compareComponents, toComponent, type ComponentInput } from "./component.js";
import { FullVersion } from "./full-version.js";

/**
 * A two-component `MAJOR.MINOR` version.
 *
 * A subset of semver: no patch number, no pre-release or build labels.
 */
export class BaseVersion {
  readonly kind = "base" as const;
  readonly major: bigint;
  readonly minor: bigint;

  constructor(major: ComponentInput, minor: ComponentInput) {
    this.major = toComponent(major, "major");
    this.minor = toComponent(minor, "minor");
    Object.freeze(this);
  }

  static from(tuple: readonly [ComponentInput, ComponentInput]): BaseVersion {
    return new BaseVersion(tuple[0], tuple[1]);
  }

  /** Lossy: the patch component is unknown and becomes `0`. */
  toFullVersionLossy(): FullVersion {
    return new FullVersion(this.major, this.minor, 0n);
  }

  equals(other: BaseVersion): boolean {
    return this.major === other.major && this.minor === other.minor;
  }

  compare(other: BaseVersion): -1 | 0 | 1 {
    return compareComponents(this.major, other.major) || compareComponents(this.minor, other.minor);
  }

  toTuple(): [bigint, bigint] {
    return [this.major, this.minor];
  }

  toString(): string {
    return `${this.major}.${this.minor}`;
  }

  toJSON(): { major: string; minor: string } {
    return { major: this.major.toString(), minor: this.minor.toString() };
  }
}
