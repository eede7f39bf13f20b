import type { Logger } from "~shared/Logger";
import { type Result, err, isErr, ok } from "~shared/utils/Result";

import { decideCaseFold } from "@/services/CaseFoldPolicy";
import type { Copier } from "@/services/Copier";
import type {
  DCIMSyncService,
  SyncError,
  SyncOptions,
  SyncReport,
} from "@/services/DCIMSyncService";
import { DirectoryIndex, getHighestNumber } from "@/services/DirectoryIndex";
import type { FileSystem } from "@/services/FileSystem";
import type { SyncPlanner } from "@/services/SyncPlanner";

export class DCIMSyncServiceDefault implements DCIMSyncService {
  private readonly fs: FileSystem;
  private readonly planner: SyncPlanner;
  private readonly copier: Copier;
  private readonly logger: Logger;

  constructor(deps: {
    fs: FileSystem;
    planner: SyncPlanner;
    copier: Copier;
    logger: Logger;
  }) {
    this.fs = deps.fs;
    this.planner = deps.planner;
    this.copier = deps.copier;
    this.logger = deps.logger.extend("DCIMSyncServiceDefault");
  }

  async sync(
    sourceRoot: string,
    destinationRoot: string,
    options: SyncOptions = {}
  ): Promise<Result<SyncReport, SyncError>> {
    const logger = this.logger.extend("sync");
    const deps = { fs: this.fs, logger: this.logger };

    const source = new DirectoryIndex(sourceRoot, deps);
    const sourceScan = await source.scan();
    if (isErr(sourceScan)) {
      return err({ phase: "scan-source", ...sourceScan.error });
    }
    const destination = new DirectoryIndex(destinationRoot, deps);
    const destinationScan = await destination.scan();
    if (isErr(destinationScan)) {
      return err({ phase: "scan-destination", ...destinationScan.error });
    }

    const planRes = this.planner.plan(source, destination);
    if (isErr(planRes)) return err({ phase: "plan", ...planRes.error });
    const tasks = planRes.value;

    const caseFold = decideCaseFold(destination, options);
    const report: SyncReport = {
      source: sourceRoot,
      destination: destinationRoot,
      sourceMark: getHighestNumber(source),
      destinationMark: getHighestNumber(destination),
      caseFold,
      dummy: options.dummy ?? false,
      tasks,
      copied: [],
      skipped: [],
      planned: [],
    };
    logger.info({
      event: "plan",
      emoji: "🗺️",
      caseFold,
      tasks: tasks.length,
    })`來源 ${formatMark(report.sourceMark)}，目的地 ${formatMark(report.destinationMark)}`;

    for (const task of tasks) {
      logger.debug({ event: "task", ...task })`處理目錄 ${task.dirNumber}`;
      const res = await this.copier.execute(
        task,
        source,
        destination,
        caseFold,
        { dummy: options.dummy }
      );
      if (isErr(res)) return err({ phase: "copy", task, ...res.error });
      report.copied.push(...res.value.copied);
      report.skipped.push(...res.value.skipped);
      report.planned.push(...res.value.planned);
    }

    return ok(report);
  }
}

function formatMark(mark: SyncReport["sourceMark"]) {
  return mark ? `${mark.dirNumber}/${mark.fileNumber}` : "(空)";
}
