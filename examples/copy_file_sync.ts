// Example: copy a file through a BufferedReader and a BufferedWriter backed
// by plain node:fs file descriptors.
import { closeSync, fsyncSync, openSync, readSync, writeSync } from "node:fs";
import { BufferedReader } from "../src/io/buffered_reader.ts";
import { BufferedWriter } from "../src/io/buffered_writer.ts";
import type { ISink, ISource } from "../src/io/streams.ts";

/**
 * Minimal synchronous source over a file descriptor.
 */
export class FileSource implements ISource {
  #fd: number;
  #eof = false;

  constructor(path: string) {
    this.#fd = openSync(path, "r");
  }

  read(destination: Uint8Array): number | undefined {
    if (this.#eof) {
      return undefined;
    }
    if (destination.length === 0) {
      return 0;
    }
    const count = readSync(this.#fd, destination, 0, destination.length, null);
    if (count === 0) {
      this.#eof = true;
      return undefined;
    }
    return count;
  }

  eof(): boolean {
    return this.#eof;
  }

  close(): void {
    closeSync(this.#fd);
  }
}

/**
 * Minimal synchronous sink over a file descriptor. flush() asks the OS to
 * persist the file.
 */
export class FileSink implements ISink {
  #fd: number;
  #writes = 0;

  constructor(path: string) {
    this.#fd = openSync(path, "w");
  }

  write(data: Uint8Array): void {
    this.#writes++;
    let offset = 0;
    while (offset < data.length) {
      offset += writeSync(this.#fd, data, offset, data.length - offset);
    }
  }

  flush(): void {
    fsyncSync(this.#fd);
  }

  /** Number of write() calls received. */
  writeCount(): number {
    return this.#writes;
  }

  close(): void {
    closeSync(this.#fd);
  }
}

/**
 * Copies `from` to `to` in chunks of `chunkSize`, buffering both sides.
 * Returns the number of write calls the destination file received.
 */
export function copyFileBuffered(
  from: string,
  to: string,
  chunkSize = 512,
  capacity = 64 * 1024,
): number {
  const reader = new BufferedReader(new FileSource(from), { capacity });
  const writer = new BufferedWriter(new FileSink(to), { capacity });
  const chunk = new Uint8Array(chunkSize);

  try {
    for (;;) {
      const count = reader.read(chunk);
      if (count === undefined) {
        break;
      }
      writer.write(chunk.subarray(0, count));
    }
    writer.flush();
    return writer.innerRef().writeCount();
  } finally {
    reader.inner().close();
    writer.innerRef().close();
  }
}
