import { format } from "date-fns";
import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";

import type { DumpWriter } from "./DumpWriter";

export class DumpWriterDefault implements DumpWriter {
  private readonly logger: Logger;

  constructor(
    logger: Logger,
    private readonly dir: string
  ) {
    this.logger = logger.extend("dump");
  }

  async dump(name: string, data: unknown) {
    await mkdir(this.dir, { recursive: true });
    const stamp = format(new Date(), "yyyyMMdd-HHmmss");
    const file = path.join(this.dir, `${stamp}-${name}.json`);
    await writeFile(file, JSON.stringify(data, null, 2));
    this.logger.info({ emoji: "📝", file })`已輸出報告 ${name}`;
    return file;
  }
}
