import type { Result } from "~shared/utils/Result";

import type { DirectoryIndex } from "@/services/DirectoryIndex";
import type { CopyTask } from "@/types";

export type PlanError = {
  type: "NO_SOURCE_DATA";
  message: string;
};

export interface SyncPlanner {
  /**
   * 比較來源與目的地的最高水位，產生依目錄序號排序的複製任務。
   * 兩個索引都必須已經掃描。
   */
  plan(
    source: DirectoryIndex,
    destination: DirectoryIndex
  ): Result<CopyTask[], PlanError>;
}
