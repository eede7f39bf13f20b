import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, err, isErr, ok } from "~shared/utils/Result";

import { matchFile, matchSubdir } from "@/services/DCIMNameParser";
import type { FileSystem, FileSystemError } from "@/services/FileSystem";

export type ScanError = {
  type: "SCAN_FAILED";
  path: string;
  message: string;
  cause: FileSystemError;
};

export type CaseObservation = {
  hasUppercase: boolean;
  hasLowercase: boolean;
};

/**
 * 一個 DCIM 根目錄的序號索引：
 *
 *   DCIM/
 *     100NIKON/DSC_0001.JPG, DSC_0001.NEF, DSC_0002.JPG
 *     101NIKON/（空）
 *
 * → dirNumberToName  = { 100: "100NIKON", 101: "101NIKON" }
 * → dirNumberToFiles = { 100: { 1: {DSC_0001.JPG, DSC_0001.NEF}, 2: {DSC_0002.JPG} } }
 *
 * 建立後必須先呼叫 scan()，未掃描前查詢會直接丟錯。
 */
export class DirectoryIndex implements CaseObservation {
  private readonly fs: FileSystem;
  private readonly logger: Logger;
  private names = new Map<number, string>();
  private files = new Map<number, Map<number, Set<string>>>();
  private upper = false;
  private lower = false;
  private done = false;

  constructor(
    readonly rootPath: string,
    deps: { fs: FileSystem; logger: Logger }
  ) {
    this.fs = deps.fs;
    this.logger = deps.logger.extend("DirectoryIndex", { root: rootPath });
  }

  get scanned() {
    return this.done;
  }

  get dirNumberToName(): ReadonlyMap<number, string> {
    this.assertScanned();
    return this.names;
  }

  get dirNumberToFiles(): ReadonlyMap<
    number,
    ReadonlyMap<number, ReadonlySet<string>>
  > {
    this.assertScanned();
    return this.files;
  }

  get hasUppercase() {
    this.assertScanned();
    return this.upper;
  }

  get hasLowercase() {
    this.assertScanned();
    return this.lower;
  }

  /** 掃描兩層：根目錄 → 序號目錄 → 序號檔案。重複呼叫會重建整個索引。 */
  async scan(): Promise<Result<void, ScanError>> {
    this.done = false;
    const names = new Map<number, string>();
    const files = new Map<number, Map<number, Set<string>>>();
    let upper = false;
    let lower = false;
    const observe = (name: string) => {
      if (name !== name.toLowerCase()) upper = true;
      if (name !== name.toUpperCase()) lower = true;
    };

    const rootRes = await this.fs.listEntries(this.rootPath);
    if (isErr(rootRes)) return err(toScanError(rootRes.error));

    for (const entry of rootRes.value) {
      const dir = matchSubdir(entry);
      if (!dir) continue;
      if (!(await this.fs.isDirectory(path.join(this.rootPath, entry)))) {
        continue;
      }
      const previous = names.get(dir.dirNumber);
      if (previous !== undefined) {
        this.logger.warn({
          event: "duplicate-dir-number",
          previous,
          current: dir.fullName,
        })`目錄序號 ${dir.dirNumber} 重複，改用 ${dir.fullName}`;
      }
      names.set(dir.dirNumber, dir.fullName);
    }

    for (const [dirNumber, dirName] of names) {
      const dirPath = path.join(this.rootPath, dirName);
      const listRes = await this.fs.listEntries(dirPath);
      if (isErr(listRes)) return err(toScanError(listRes.error));

      const byNumber = new Map<number, Set<string>>();
      for (const entry of listRes.value) {
        const file = matchFile(entry);
        if (!file) continue;
        const group = byNumber.get(file.fileNumber) ?? new Set<string>();
        group.add(entry);
        byNumber.set(file.fileNumber, group);
        observe(entry);
      }
      if (byNumber.size === 0) {
        this.logger.debug({ dir: dirName })`略過沒有序號檔案的目錄 ${dirName}`;
        continue;
      }
      observe(dirName);
      files.set(dirNumber, byNumber);
    }

    this.names = names;
    this.files = files;
    this.upper = upper;
    this.lower = lower;
    this.done = true;
    this.logger.debug({
      event: "scanned",
      dirs: names.size,
      nonEmptyDirs: files.size,
    })`掃描完成 ${this.rootPath}`;
    return ok();
  }

  getDirName(dirNumber: number) {
    return this.dirNumberToName.get(dirNumber);
  }

  /** 由小到大排序的檔案序號 */
  getFileNumbers(dirNumber: number) {
    const byNumber = this.dirNumberToFiles.get(dirNumber);
    if (!byNumber) return [];
    return [...byNumber.keys()].sort((a, b) => a - b);
  }

  /** 同一序號可能對應多個檔名（不同前綴或副檔名），缺號回傳空集合 */
  getFileNames(dirNumber: number, fileNumber: number): ReadonlySet<string> {
    return (
      this.dirNumberToFiles.get(dirNumber)?.get(fileNumber) ?? new Set<string>()
    );
  }

  private assertScanned() {
    if (!this.done) {
      throw new Error(`DirectoryIndex 尚未掃描: ${this.rootPath}`);
    }
  }
}

function toScanError(cause: FileSystemError): ScanError {
  return {
    type: "SCAN_FAILED",
    path: cause.path,
    message: `無法讀取目錄 ${cause.path}: ${cause.message}`,
    cause,
  };
}
