import type { HighWaterMark } from "@/types";

import type { DirectoryIndex } from "./DirectoryIndex";

/**
 * 取最大的非空目錄序號，以及該目錄內最大的檔案序號。
 * 沒有任何非空目錄時回傳 undefined。
 */
export function getHighestNumber(
  index: DirectoryIndex
): HighWaterMark | undefined {
  const dirs = index.dirNumberToFiles;
  if (dirs.size === 0) return undefined;
  const dirNumber = Math.max(...dirs.keys());
  const fileNumbers = index.getFileNumbers(dirNumber);
  return { dirNumber, fileNumber: fileNumbers[fileNumbers.length - 1] };
}
