import type { CaseObservation } from "@/services/DirectoryIndex";

export type CaseFold = "identity" | "lower" | "upper";

export type CaseFoldOptions = {
  forceLower?: boolean;
  forceUpper?: boolean;
};

/**
 * 依目的地既有的大小寫慣例決定複製後的檔名：
 * 1. 目的地沒有大寫字母，或指定 forceLower → lower
 * 2. 目的地沒有小寫字母，或指定 forceUpper → upper
 * 3. 其餘維持原樣
 *
 * forceLower 與 forceUpper 同時指定時，依上述順序 forceLower 優先。
 */
export function decideCaseFold(
  destination: CaseObservation,
  options: CaseFoldOptions = {}
): CaseFold {
  if (!destination.hasUppercase || options.forceLower) return "lower";
  if (!destination.hasLowercase || options.forceUpper) return "upper";
  return "identity";
}

export function applyCaseFold(fold: CaseFold, name: string) {
  switch (fold) {
    case "lower":
      return name.toLowerCase();
    case "upper":
      return name.toUpperCase();
    case "identity":
      return name;
  }
}
