import type { Result } from "~shared/utils/Result";

import type { CaseFold } from "@/services/CaseFoldPolicy";
import type { DirectoryIndex } from "@/services/DirectoryIndex";
import type { FileSystemError } from "@/services/FileSystem";
import type { CopyTask } from "@/types";

export type CopiedFile = { from: string; to: string };

export type CopyOutcome = {
  copied: CopiedFile[];
  /** 目的地已存在且非空的檔案 */
  skipped: string[];
  /** dummy 模式下原本會複製的檔案 */
  planned: CopiedFile[];
};

export type CopyError = {
  type: "CREATE_DIRECTORY_FAILED" | "COPY_FAILED" | "STAT_FAILED";
  path: string;
  message: string;
  cause: FileSystemError;
};

export type CopyOptions = {
  dummy?: boolean;
};

export interface Copier {
  execute(
    task: CopyTask,
    source: DirectoryIndex,
    destination: DirectoryIndex,
    caseFold: CaseFold,
    options?: CopyOptions
  ): Promise<Result<CopyOutcome, CopyError>>;
}
