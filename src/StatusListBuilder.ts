import { BitWidth, assertBitWidth, assertStatusValue } from './BitWidth';
import { pack } from './BitPacker';
import { compress } from './compression/CompressionCodec';
import { StatusList } from './StatusList';
import { StatusListError } from './errors';

type BuilderState =
  | { kind: 'open'; codes: number[] }
  | { kind: 'built' };

export interface BuildOptions {
  /** Carried through to the built list and both wire forms. */
  aggregationUri?: string;
}

/**
 * Accumulates status codes and finalizes them into a StatusList.
 *
 * ```ts
 * const list = new StatusListBuilder(2)
 *   .addStatus(StatusType.VALID)
 *   .addStatus(StatusType.SUSPENDED)
 *   .build();
 * ```
 *
 * A builder is consumed by `build()`; appending or building again afterwards
 * throws BUILDER_ALREADY_FINALIZED.
 */
export class StatusListBuilder {
  readonly bitsPerStatus: BitWidth;
  private state: BuilderState;

  constructor(bitsPerStatus: unknown) {
    this.bitsPerStatus = assertBitWidth(bitsPerStatus);
    this.state = { kind: 'open', codes: [] };
  }

  /** Create a builder pre-loaded with `codes`. */
  static fromStatuses(codes: readonly number[], bitsPerStatus: unknown): StatusListBuilder {
    return new StatusListBuilder(bitsPerStatus).addStatuses(codes);
  }

  /** Number of statuses appended so far (0 once built). */
  get length(): number {
    return this.state.kind === 'open' ? this.state.codes.length : 0;
  }

  /** Index of the most recently appended status. */
  get lastIndex(): number | undefined {
    return this.length > 0 ? this.length - 1 : undefined;
  }

  get isBuilt(): boolean {
    return this.state.kind === 'built';
  }

  addStatus(code: number): this {
    const codes = this.openCodes();
    codes.push(assertStatusValue(code, this.bitsPerStatus));
    return this;
  }

  /** Append several codes; if any is out of range none are appended. */
  addStatuses(codes: readonly number[]): this {
    const pending = this.openCodes();
    for (const code of codes) {
      assertStatusValue(code, this.bitsPerStatus);
    }
    for (const code of codes) {
      pending.push(code);
    }
    return this;
  }

  build(options?: BuildOptions): StatusList {
    const codes = this.openCodes();
    const list = new StatusList(
      this.bitsPerStatus,
      compress(pack(codes, this.bitsPerStatus)),
      options?.aggregationUri,
    );
    this.state = { kind: 'built' };
    return list;
  }

  private openCodes(): number[] {
    if (this.state.kind === 'built') {
      throw new StatusListError(
        'BUILDER_ALREADY_FINALIZED',
        'StatusListBuilder has already been built',
      );
    }
    return this.state.codes;
  }
}
