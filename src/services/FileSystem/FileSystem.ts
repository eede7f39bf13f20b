import type { Result } from "~shared/utils/Result";

export type FileSystemError = {
  type: "NOT_FOUND" | "PERMISSION_DENIED" | "IO_FAILED";
  path: string;
  message: string;
};

/**
 * 同步流程所需的最小檔案系統操作。
 * 所有呼叫都由呼叫端依序 await，不做並行。
 */
export interface FileSystem {
  listEntries(dirPath: string): Promise<Result<string[], FileSystemError>>;
  isDirectory(targetPath: string): Promise<boolean>;
  createDirectory(dirPath: string): Promise<Result<void, FileSystemError>>;
  fileExists(targetPath: string): Promise<boolean>;
  fileSize(targetPath: string): Promise<Result<number, FileSystemError>>;
  copyBytes(
    sourcePath: string,
    destinationPath: string
  ): Promise<Result<void, FileSystemError>>;
}
