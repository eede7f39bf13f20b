import { copyFile, mkdir, readdir, stat } from "node:fs/promises";

import { type Result, err, ok } from "~shared/utils/Result";

import type { FileSystem, FileSystemError } from "./FileSystem";

function toFileSystemError(targetPath: string, e: unknown): FileSystemError {
  const code =
    typeof e === "object" && e !== null && "code" in e ? e.code : undefined;
  const message = e instanceof Error ? e.message : String(e);
  if (code === "ENOENT" || code === "ENOTDIR") {
    return { type: "NOT_FOUND", path: targetPath, message };
  }
  if (code === "EACCES" || code === "EPERM") {
    return { type: "PERMISSION_DENIED", path: targetPath, message };
  }
  return { type: "IO_FAILED", path: targetPath, message };
}

export class FileSystemNode implements FileSystem {
  async listEntries(
    dirPath: string
  ): Promise<Result<string[], FileSystemError>> {
    try {
      return ok(await readdir(dirPath));
    } catch (e) {
      return err(toFileSystemError(dirPath, e));
    }
  }

  async isDirectory(targetPath: string) {
    try {
      return (await stat(targetPath)).isDirectory();
    } catch {
      return false;
    }
  }

  async createDirectory(
    dirPath: string
  ): Promise<Result<void, FileSystemError>> {
    try {
      await mkdir(dirPath, { recursive: true });
      return ok();
    } catch (e) {
      return err(toFileSystemError(dirPath, e));
    }
  }

  async fileExists(targetPath: string) {
    try {
      await stat(targetPath);
      return true;
    } catch {
      return false;
    }
  }

  async fileSize(targetPath: string): Promise<Result<number, FileSystemError>> {
    try {
      return ok((await stat(targetPath)).size);
    } catch (e) {
      return err(toFileSystemError(targetPath, e));
    }
  }

  async copyBytes(
    sourcePath: string,
    destinationPath: string
  ): Promise<Result<void, FileSystemError>> {
    try {
      await copyFile(sourcePath, destinationPath);
      return ok();
    } catch (e) {
      return err(toFileSystemError(destinationPath, e));
    }
  }
}
