import { describe, expect, test } from "vitest";

import { buildTestLogger } from "~shared/testkit/TestLogger";

import { DirectoryIndex, getHighestNumber } from "@/services/DirectoryIndex";

import { FileSystemFake, buildIndex, seedTree } from "~test/fakes/FileSystemFake";

const ROOT = "/card/DCIM";

function buildContext(tree: Record<string, string[]>) {
  const fs = seedTree(new FileSystemFake(), ROOT, tree);
  const index = new DirectoryIndex(ROOT, { fs, logger: buildTestLogger() });
  return { fs, index };
}

describe("DirectoryIndex", () => {
  test("依目錄序號與檔案序號建立索引，同序號檔名合併", async () => {
    const { fs, index } = buildContext({
      "100NIKON": ["DSC_0001.JPG", "DSC_0001.NEF", "DSC_0002.JPG", "NOTES.TXT"],
      "101NIKON": [],
      MISC: ["DSC_0009.JPG"],
    });
    fs.addFile(`${ROOT}/102FILE`);

    const res = await index.scan();

    expect(res.ok).toBe(true);
    expect(index.scanned).toBe(true);
    expect(index.dirNumberToName).toEqual(
      new Map([
        [100, "100NIKON"],
        [101, "101NIKON"],
      ])
    );
    expect(index.dirNumberToFiles).toEqual(
      new Map([
        [
          100,
          new Map([
            [1, new Set(["DSC_0001.JPG", "DSC_0001.NEF"])],
            [2, new Set(["DSC_0002.JPG"])],
          ]),
        ],
      ])
    );
    expect(index.getFileNumbers(100)).toEqual([1, 2]);
    expect(index.getFileNumbers(101)).toEqual([]);
    expect(index.getFileNames(100, 3).size).toBe(0);
  });

  test("全大寫名稱只設定 hasUppercase", async () => {
    const { index } = buildContext({ "100NIKON": ["DSC_0001.JPG"] });
    await index.scan();
    expect(index.hasUppercase).toBe(true);
    expect(index.hasLowercase).toBe(false);
  });

  test("混合大小寫同時設定兩個旗標", async () => {
    const { index } = buildContext({ "100Canon": ["IMG_0001.JPG"] });
    await index.scan();
    expect(index.hasUppercase).toBe(true);
    expect(index.hasLowercase).toBe(true);
  });

  test("沒有字母的名稱與空目錄不影響大小寫判斷", async () => {
    const { index } = buildContext({
      "100___": ["____0001.123"],
      "101nikon": [],
    });
    await index.scan();
    expect(index.hasUppercase).toBe(false);
    expect(index.hasLowercase).toBe(false);
  });

  test("目錄序號重複時以最後列舉者為準", async () => {
    const { index } = buildContext({
      "100NIKON": ["DSC_0001.JPG"],
      "100CANON": ["IMG_0007.JPG"],
    });
    await index.scan();
    expect(index.getDirName(100)).toBe("100CANON");
    expect(index.getFileNumbers(100)).toEqual([7]);
  });

  test("重複掃描同一棵樹結果相同", async () => {
    const { index } = buildContext({
      "100NIKON": ["DSC_0001.JPG", "DSC_0002.JPG"],
      "101NIKON": ["DSC_0003.JPG"],
    });
    await index.scan();
    const first = {
      names: index.dirNumberToName,
      files: index.dirNumberToFiles,
      upper: index.hasUppercase,
      lower: index.hasLowercase,
    };
    await index.scan();
    expect(index.dirNumberToName).toEqual(first.names);
    expect(index.dirNumberToFiles).toEqual(first.files);
    expect(index.hasUppercase).toBe(first.upper);
    expect(index.hasLowercase).toBe(first.lower);
  });

  test("子目錄無法讀取 → SCAN_FAILED 且維持未掃描", async () => {
    const { fs, index } = buildContext({ "100NIKON": ["DSC_0001.JPG"] });
    fs.failOn(`${ROOT}/100NIKON`, "PERMISSION_DENIED");

    const res = await index.scan();

    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.error.type).toBe("SCAN_FAILED");
      expect(res.error.path).toBe(`${ROOT}/100NIKON`);
      expect(res.error.cause.type).toBe("PERMISSION_DENIED");
    }
    expect(index.scanned).toBe(false);
  });

  test("根目錄不存在 → NOT_FOUND", async () => {
    const fs = new FileSystemFake();
    const index = new DirectoryIndex("/nowhere", {
      fs,
      logger: buildTestLogger(),
    });
    const res = await index.scan();
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.error.cause.type).toBe("NOT_FOUND");
  });

  test("未掃描前查詢會丟錯", () => {
    const { index } = buildContext({});
    expect(() => index.hasUppercase).toThrow("尚未掃描");
    expect(() => index.getFileNumbers(100)).toThrow("尚未掃描");
  });
});

describe("getHighestNumber", () => {
  test("沒有非空目錄 → undefined", async () => {
    const fs = seedTree(new FileSystemFake(), ROOT, { "100NIKON": ["x.txt"] });
    const index = await buildIndex(fs, ROOT);
    expect(getHighestNumber(index)).toBeUndefined();
  });

  test("取最大非空目錄中的最大序號，忽略更高的空目錄", async () => {
    const fs = seedTree(new FileSystemFake(), ROOT, {
      "100NIKON": ["DSC_0001.JPG", "DSC_0250.JPG"],
      "101NIKON": ["DSC_0003.JPG", "DSC_0012.JPG", "DSC_0004.NEF"],
      "102NIKON": [],
    });
    const index = await buildIndex(fs, ROOT);

    const mark = getHighestNumber(index);

    expect(mark).toEqual({ dirNumber: 101, fileNumber: 12 });
    expect(index.getFileNames(101, 12).size).toBeGreaterThan(0);
  });
});
