import { type Options, type RotatingFileStream, createStream } from "rotating-file-stream";

import type { LogRecord, LogTransport } from "./Logger";

export type RfsTransportOptions = {
  filename: string;
  rfs?: Options;
};

/** 以 JSON lines 寫入輪替檔案 */
export class RfsTransport implements LogTransport {
  private readonly stream: RotatingFileStream;

  constructor(options: RfsTransportOptions) {
    this.stream = createStream(options.filename, {
      size: "10M",
      maxFiles: 10,
      ...options.rfs,
    });
  }

  write(record: LogRecord) {
    this.stream.write(JSON.stringify(record) + "\n");
  }

  async [Symbol.asyncDispose]() {
    await new Promise<void>((resolve, reject) => {
      this.stream.once("error", reject);
      this.stream.end(() => resolve());
    });
  }
}
