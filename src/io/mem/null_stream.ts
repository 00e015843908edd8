import type { IDuplex } from "../streams.ts";

/**
 * Duplex object equivalent to /dev/null: writes vanish and reads are always
 * at end of stream.
 */
export class NullStream implements IDuplex {
  public read(_destination: Uint8Array): number | undefined {
    return undefined;
  }

  public eof(): boolean {
    return true;
  }

  public write(_data: Uint8Array): void {}

  public flush(): void {}
}
