import type { Result } from "~shared/utils/Result";

import type { CaseFold, CaseFoldOptions } from "@/services/CaseFoldPolicy";
import type { CopiedFile, CopyError } from "@/services/Copier";
import type { ScanError } from "@/services/DirectoryIndex";
import type { PlanError } from "@/services/SyncPlanner";
import type { CopyTask, HighWaterMark } from "@/types";

export type SyncOptions = CaseFoldOptions & {
  /** 只產生計畫與報告，不寫入目的地 */
  dummy?: boolean;
};

export type SyncReport = {
  source: string;
  destination: string;
  sourceMark?: HighWaterMark;
  destinationMark?: HighWaterMark;
  caseFold: CaseFold;
  dummy: boolean;
  tasks: CopyTask[];
  copied: CopiedFile[];
  skipped: string[];
  planned: CopiedFile[];
};

export type SyncError =
  | ({ phase: "scan-source" | "scan-destination" } & ScanError)
  | ({ phase: "plan" } & PlanError)
  | ({ phase: "copy"; task: CopyTask } & CopyError);

export interface DCIMSyncService {
  sync(
    sourceRoot: string,
    destinationRoot: string,
    options?: SyncOptions
  ): Promise<Result<SyncReport, SyncError>>;
}
