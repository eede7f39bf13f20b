import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, err, isErr, ok } from "~shared/utils/Result";

import { type CaseFold, applyCaseFold } from "@/services/CaseFoldPolicy";
import type { DirectoryIndex } from "@/services/DirectoryIndex";
import type { FileSystem, FileSystemError } from "@/services/FileSystem";
import type { CopyTask } from "@/types";

import type { CopyError, CopyOptions, CopyOutcome, Copier } from "./Copier";

function copyError(
  type: CopyError["type"],
  cause: FileSystemError
): CopyError {
  return { type, path: cause.path, message: cause.message, cause };
}

/**
 * 依任務把來源目錄的序號檔案複製到目的地同名（經大小寫轉換）目錄。
 * 不是交易式：中途失敗時已複製的檔案會留著，重跑會因「已存在且非空」而略過。
 */
export class CopierDefault implements Copier {
  private readonly fs: FileSystem;
  private readonly logger: Logger;

  constructor(deps: { fs: FileSystem; logger: Logger }) {
    this.fs = deps.fs;
    this.logger = deps.logger.extend("Copier");
  }

  async execute(
    task: CopyTask,
    source: DirectoryIndex,
    destination: DirectoryIndex,
    caseFold: CaseFold,
    options: CopyOptions = {}
  ): Promise<Result<CopyOutcome, CopyError>> {
    const outcome: CopyOutcome = { copied: [], skipped: [], planned: [] };
    const sourceDirName = source.getDirName(task.dirNumber);
    if (sourceDirName === undefined) return ok(outcome);

    const end = task.endFileNumber ?? Number.POSITIVE_INFINITY;
    const fileNumbers = source
      .getFileNumbers(task.dirNumber)
      .filter((n) => n >= task.startFileNumber && n <= end);
    if (fileNumbers.length === 0) return ok(outcome);

    const logger = this.logger.extend("execute", { dir: sourceDirName });
    const sourceDir = path.join(source.rootPath, sourceDirName);
    const targetDir = path.join(
      destination.rootPath,
      applyCaseFold(caseFold, sourceDirName)
    );

    if (!options.dummy && !(await this.fs.isDirectory(targetDir))) {
      const mkdirRes = await this.fs.createDirectory(targetDir);
      if (isErr(mkdirRes)) {
        return err(copyError("CREATE_DIRECTORY_FAILED", mkdirRes.error));
      }
      logger.debug({ emoji: "📁" })`建立目錄 ${targetDir}`;
    }

    for (const fileNumber of fileNumbers) {
      const names = [...source.getFileNames(task.dirNumber, fileNumber)].sort();
      for (const name of names) {
        const from = path.join(sourceDir, name);
        const to = path.join(targetDir, applyCaseFold(caseFold, name));

        if (await this.fs.isDirectory(to)) {
          return err(
            copyError("COPY_FAILED", {
              type: "IO_FAILED",
              path: to,
              message: `目的地路徑已是目錄: ${to}`,
            })
          );
        }
        if (await this.fs.fileExists(to)) {
          const sizeRes = await this.fs.fileSize(to);
          if (isErr(sizeRes)) {
            return err(copyError("STAT_FAILED", sizeRes.error));
          }
          if (sizeRes.value > 0) {
            outcome.skipped.push(to);
            logger.debug({ event: "skipped" })`已存在，略過 ${to}`;
            continue;
          }
        }

        if (options.dummy) {
          outcome.planned.push({ from, to });
          logger.info({ event: "dummy", emoji: "👀" })`${from} → ${to}`;
          continue;
        }

        const copyRes = await this.fs.copyBytes(from, to);
        if (isErr(copyRes)) {
          return err(copyError("COPY_FAILED", copyRes.error));
        }
        outcome.copied.push({ from, to });
        logger.info({ event: "copied", emoji: "📦" })`${from} → ${to}`;
      }
    }
    return ok(outcome);
  }
}
