import type { CAC } from "cac";

import { DumpWriterDefault } from "~shared/DumpWriter/DumpWriterDefault";
import type { LogLevel, Logger } from "~shared/Logger";
import { dispose } from "~shared/utils/Disposeable";
import { isErr } from "~shared/utils/Result";

import { CopierDefault } from "@/services/CopierDefault";
import type { SyncError } from "@/services/DCIMSyncService";
import { DCIMSyncServiceDefault } from "@/services/DCIMSyncServiceDefault";
import { FileSystemNode } from "@/services/FileSystem";
import { SyncPlannerDefault } from "@/services/SyncPlannerDefault";
import { countVerbosity, expandHome, levelOfVerbosity } from "@/utils/helper";

type SyncCliOptions = {
  verbose?: unknown;
  dummy?: boolean;
  lower?: boolean;
  upper?: boolean;
  report?: string;
};

export type LoggerFactory = (level?: LogLevel) => Logger & AsyncDisposable;

export function registerSync(cli: CAC, createLogger: LoggerFactory) {
  cli
    .command("[...dirs]", "將來源 DCIM 目錄中比目的地新的序號檔案複製過去")
    .usage("[options] <source-dir> <destination-dir>")
    .option("-v, --verbose", "輸出更多細節，可重複指定 (-vv)")
    .option("-n, --dummy", "只列出要複製的檔案，不寫入目的地", {
      default: false,
    })
    .option("-l, --lower", "強制目的地檔名轉為小寫", { default: false })
    .option("-u, --upper", "強制目的地檔名轉為大寫", { default: false })
    .option("--report <dir>", "將同步報告以 JSON 輸出到指定目錄")
    .example("dcim-sync /media/card/DCIM ~/pictures/DCIM")
    .action(async (dirs: string[], options: SyncCliOptions) => {
      const logger = createLogger(
        levelOfVerbosity(countVerbosity(options.verbose))
      );
      try {
        process.exitCode = await runSync(cli, logger, dirs, options);
      } finally {
        await dispose(logger);
      }
    });
}

async function runSync(
  cli: CAC,
  baseLogger: Logger,
  dirs: string[],
  options: SyncCliOptions
) {
  const logger = baseLogger.extend("sync");

  if (dirs.length !== 2) {
    logger.error({
      count: dirs.length,
    })`需要剛好兩個參數：來源目錄與目的地目錄`;
    cli.outputHelp();
    return 1;
  }
  if (options.lower && options.upper) {
    logger.warn({
      event: "conflicting-case-flags",
    })`同時指定 --lower 與 --upper，以 --lower 為準`;
  }

  const [source, destination] = dirs.map(expandHome);
  logger.info({
    emoji: "📁",
    dummy: options.dummy,
  })`來源: ${source} → 目的地: ${destination}`;

  const fs = new FileSystemNode();
  const service = new DCIMSyncServiceDefault({
    fs,
    planner: new SyncPlannerDefault(),
    copier: new CopierDefault({ fs, logger }),
    logger,
  });
  const res = await service.sync(source, destination, {
    forceLower: options.lower,
    forceUpper: options.upper,
    dummy: options.dummy,
  });
  if (isErr(res)) {
    reportError(logger, res.error);
    if (options.report) {
      await new DumpWriterDefault(logger, options.report).dump(
        "sync-error",
        res.error
      );
    }
    return 1;
  }

  const report = res.value;
  if (options.report) {
    await new DumpWriterDefault(logger, options.report).dump(
      "sync-report",
      report
    );
  }

  if (report.tasks.length === 0) {
    logger.info({ event: "done" })`目的地已是最新，沒有需要複製的檔案`;
    return 0;
  }
  if (report.dummy) {
    logger.info({
      event: "done",
      planned: report.planned.length,
      skipped: report.skipped.length,
    })`dummy 模式：預計複製 ${report.planned.length} 個檔案`;
    return 0;
  }
  logger.info({
    event: "done",
    copied: report.copied.length,
    skipped: report.skipped.length,
  })`同步完成，複製 ${report.copied.length} 個檔案，略過 ${report.skipped.length} 個`;
  return 0;
}

function reportError(logger: Logger, error: SyncError) {
  switch (error.phase) {
    case "plan":
      logger.error({
        error,
      })`${error.message}。請確認來源指向 DCIM 目錄本身（例如 /media/card/DCIM），而不是它的上層。`;
      return;
    case "scan-source":
    case "scan-destination":
      logger.error({ error })`掃描失敗：${error.message}`;
      return;
    case "copy":
      logger.error({
        error,
      })`複製目錄 ${error.task.dirNumber} 時失敗，已複製的檔案會保留，可直接重跑：${error.message}`;
      return;
  }
}
