import { describe, expect, it } from "vitest";
import { BufferedStream } from "../buffered_stream.ts";
import { MemReader } from "../mem/mem_reader.ts";
import { MemWriter } from "../mem/mem_writer.ts";
import { NullStream } from "../mem/null_stream.ts";
import type { IDuplex } from "../streams.ts";

/** Duplex object whose input and output are separate in-memory buffers. */
class MemDuplex implements IDuplex {
  public readonly input: MemReader;
  public readonly output = new MemWriter();

  public constructor(input: Uint8Array, chunkSize?: number) {
    this.input = new MemReader(input, chunkSize);
  }

  public read(destination: Uint8Array): number | undefined {
    return this.input.read(destination);
  }

  public eof(): boolean {
    return this.input.eof();
  }

  public write(data: Uint8Array): void {
    this.output.write(data);
  }

  public flush(): void {
    this.output.flush();
  }
}

describe("BufferedStream", () => {
  it("supports every operation over a null stream", () => {
    const stream = new BufferedStream(new NullStream());
    const buf = new Uint8Array(0);
    expect(stream.read(buf)).toBeUndefined();
    expect(stream.eof()).toBe(true);
    stream.write(buf);
    stream.flush();
  });

  it("buffers input and output independently", () => {
    const duplex = new MemDuplex(new Uint8Array([1, 2, 3, 4, 5]));
    const stream = new BufferedStream(duplex, {
      readerCapacity: 2,
      writerCapacity: 4,
    });

    stream.write(new Uint8Array([9, 8]));
    expect(stream.pending()).toBe(2);

    const buf = new Uint8Array(5);
    expect(stream.read(buf)).toBe(2);
    expect(buf.subarray(0, 2)).toEqual(new Uint8Array([1, 2]));
    expect(duplex.input.offset()).toBe(2);
    // reading does not push pending output
    expect(duplex.output.writeCount()).toBe(0);

    stream.flush();
    expect(duplex.output.toUint8Array()).toEqual(new Uint8Array([9, 8]));
    expect(duplex.output.flushCount()).toBe(1);
    expect(stream.buffered()).toBe(0);
  });

  it("exposes fill, consume and eof of the input side", () => {
    const duplex = new MemDuplex(new Uint8Array([1, 2, 3]));
    const stream = new BufferedStream(duplex, { readerCapacity: 2 });

    expect(stream.fill()).toEqual(new Uint8Array([1, 2]));
    stream.consume(2);
    expect(stream.eof()).toBe(false);
    expect(stream.readByte()).toBe(3);
    expect(stream.eof()).toBe(true);
    expect(stream.readByte()).toBeUndefined();
  });

  it("reads delimited records", () => {
    const request = new TextEncoder().encode("PING\nPONG\n");
    const stream = new BufferedStream(new MemDuplex(request, 3), {
      readerCapacity: 4,
    });

    expect(new TextDecoder().decode(stream.readUntil(0x0a))).toBe("PING\n");
    expect(new TextDecoder().decode(stream.readUntil(0x0a))).toBe("PONG\n");
    expect(stream.readUntil(0x0a)).toBeUndefined();
  });

  it("writes oversized output straight to the duplex object", () => {
    const duplex = new MemDuplex(new Uint8Array());
    const stream = new BufferedStream(duplex, { writerCapacity: 2 });
    stream.write(new Uint8Array([1]));
    stream.write(new Uint8Array([2, 3, 4]));
    expect(duplex.output.writeCount()).toBe(2);
    expect(duplex.output.toUint8Array()).toEqual(new Uint8Array([1, 2, 3, 4]));
  });

  it("writes pending output on inner", () => {
    const duplex = new MemDuplex(new Uint8Array([1]));
    const stream = new BufferedStream(duplex);
    stream.write(new Uint8Array([7]));
    expect(stream.innerRef()).toBe(duplex);
    expect(duplex.output.length()).toBe(0);

    expect(stream.inner()).toBe(duplex);
    expect(duplex.output.toUint8Array()).toEqual(new Uint8Array([7]));
  });
});
