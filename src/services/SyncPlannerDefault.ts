import { type Result, err, ok } from "~shared/utils/Result";

import { type DirectoryIndex, getHighestNumber } from "@/services/DirectoryIndex";
import type { CopyTask, HighWaterMark } from "@/types";

import type { PlanError, SyncPlanner } from "./SyncPlanner";

/** 目的地為空時的水位，任何來源水位都比它新 */
const EMPTY_MARK: HighWaterMark = { dirNumber: 0, fileNumber: -1 };

/**
 * 檔案序號只在同一個目錄序號內有意義：
 * - 同目錄：從目的地最後一號的下一號接著複製
 * - 跨目錄：先補完目的地最後一個目錄，之後的目錄整個複製
 *
 *   src  100(1..5) 101(1..3)
 *   dest 100(1..3)
 *   → [100: 4..], [101: 1..]
 */
export class SyncPlannerDefault implements SyncPlanner {
  plan(
    source: DirectoryIndex,
    destination: DirectoryIndex
  ): Result<CopyTask[], PlanError> {
    const src = getHighestNumber(source);
    if (!src) {
      return err({
        type: "NO_SOURCE_DATA",
        message: `來源目錄 ${source.rootPath} 找不到任何含序號檔案的序號目錄（例如 100NIKON/DSC_0001.JPG）`,
      });
    }
    const dest = getHighestNumber(destination) ?? EMPTY_MARK;

    if (src.dirNumber < dest.dirNumber) return ok([]);

    if (src.dirNumber === dest.dirNumber) {
      if (src.fileNumber <= dest.fileNumber) return ok([]);
      return ok([
        {
          dirNumber: src.dirNumber,
          startFileNumber: dest.fileNumber + 1,
          endFileNumber: src.fileNumber,
        },
      ]);
    }

    const tasks: CopyTask[] = [];
    const newerInLastDir = source
      .getFileNumbers(dest.dirNumber)
      .some((n) => n > dest.fileNumber);
    if (newerInLastDir) {
      tasks.push({
        dirNumber: dest.dirNumber,
        startFileNumber: dest.fileNumber + 1,
      });
    }

    const laterDirs = [...source.dirNumberToFiles.keys()]
      .filter((d) => d > dest.dirNumber && d <= src.dirNumber)
      .sort((a, b) => a - b);
    for (const dirNumber of laterDirs) {
      tasks.push({
        dirNumber,
        startFileNumber: source.getFileNumbers(dirNumber)[0],
      });
    }
    return ok(tasks);
  }
}
