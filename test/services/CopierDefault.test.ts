import { describe, expect, test } from "vitest";

import { buildTestLogger } from "~shared/testkit/TestLogger";

import { CopierDefault } from "@/services/CopierDefault";

import { FileSystemFake, buildIndex, seedTree } from "~test/fakes/FileSystemFake";

async function buildContext(destination: Record<string, string[]> = {}) {
  const fs = new FileSystemFake();
  seedTree(fs, "/src", {
    "100NIKON": ["DSC_0002.JPG", "DSC_0001.NEF", "DSC_0001.JPG", "DSC_0004.JPG"],
  });
  seedTree(fs, "/dst", destination);
  const copier = new CopierDefault({ fs, logger: buildTestLogger() });
  return {
    fs,
    copier,
    source: await buildIndex(fs, "/src"),
    destination: await buildIndex(fs, "/dst"),
  };
}

describe("CopierDefault", () => {
  test("依序號複製、同序號全部檔名一起複製、缺號略過，並套用小寫", async () => {
    const { fs, copier, source, destination } = await buildContext();

    const res = await copier.execute(
      { dirNumber: 100, startFileNumber: 1 },
      source,
      destination,
      "lower"
    );

    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.value.copied).toEqual([
      { from: "/src/100NIKON/DSC_0001.JPG", to: "/dst/100nikon/dsc_0001.jpg" },
      { from: "/src/100NIKON/DSC_0001.NEF", to: "/dst/100nikon/dsc_0001.nef" },
      { from: "/src/100NIKON/DSC_0002.JPG", to: "/dst/100nikon/dsc_0002.jpg" },
      { from: "/src/100NIKON/DSC_0004.JPG", to: "/dst/100nikon/dsc_0004.jpg" },
    ]);
    expect(fs.list("/dst/100nikon")).toEqual([
      "dsc_0001.jpg",
      "dsc_0001.nef",
      "dsc_0002.jpg",
      "dsc_0004.jpg",
    ]);
  });

  test("只複製任務區間內的序號", async () => {
    const { copier, source, destination } = await buildContext();
    const res = await copier.execute(
      { dirNumber: 100, startFileNumber: 2, endFileNumber: 3 },
      source,
      destination,
      "identity"
    );
    expect(res.ok && res.value.copied).toEqual([
      { from: "/src/100NIKON/DSC_0002.JPG", to: "/dst/100NIKON/DSC_0002.JPG" },
    ]);
  });

  test("目的地已存在且非空 → 略過；0 byte → 重新複製", async () => {
    const { fs, copier, source, destination } = await buildContext();
    fs.addFile("/dst/100NIKON/DSC_0001.JPG", "old");
    fs.addFile("/dst/100NIKON/DSC_0002.JPG", "");

    const res = await copier.execute(
      { dirNumber: 100, startFileNumber: 1, endFileNumber: 2 },
      source,
      destination,
      "identity"
    );

    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.value.skipped).toEqual(["/dst/100NIKON/DSC_0001.JPG"]);
    expect(res.value.copied.map((c) => c.to)).toEqual([
      "/dst/100NIKON/DSC_0001.NEF",
      "/dst/100NIKON/DSC_0002.JPG",
    ]);
    expect(fs.readFile("/dst/100NIKON/DSC_0001.JPG")).toBe("old");
    expect(fs.readFile("/dst/100NIKON/DSC_0002.JPG")).toBe("data");
  });

  test("dummy 模式只回報，不建立目錄也不寫檔", async () => {
    const { fs, copier, source, destination } = await buildContext();

    const res = await copier.execute(
      { dirNumber: 100, startFileNumber: 4 },
      source,
      destination,
      "upper",
      { dummy: true }
    );

    expect(res.ok && res.value.planned).toEqual([
      { from: "/src/100NIKON/DSC_0004.JPG", to: "/dst/100NIKON/DSC_0004.JPG" },
    ]);
    expect(fs.copies).toEqual([]);
    expect(fs.list("/dst")).toEqual([]);
  });

  test("複製失敗 → COPY_FAILED，先前複製的檔案保留", async () => {
    const { fs, copier, source, destination } = await buildContext();
    fs.failOn("/dst/100NIKON/DSC_0002.JPG");

    const res = await copier.execute(
      { dirNumber: 100, startFileNumber: 1 },
      source,
      destination,
      "identity"
    );

    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.error.type).toBe("COPY_FAILED");
      expect(res.error.path).toBe("/dst/100NIKON/DSC_0002.JPG");
    }
    expect(fs.readFile("/dst/100NIKON/DSC_0001.JPG")).toBe("data");
    expect(fs.readFile("/dst/100NIKON/DSC_0004.JPG")).toBeUndefined();
  });

  test("目的地檔名位置是目錄 → COPY_FAILED，不當成已存在略過", async () => {
    const { fs, copier, source, destination } = await buildContext();
    fs.addDir("/dst/100NIKON/DSC_0001.JPG");

    const res = await copier.execute(
      { dirNumber: 100, startFileNumber: 1 },
      source,
      destination,
      "identity"
    );

    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.error.type).toBe("COPY_FAILED");
      expect(res.error.path).toBe("/dst/100NIKON/DSC_0001.JPG");
    }
    expect(fs.copies).toEqual([]);
  });

  test("無法建立目的地目錄 → CREATE_DIRECTORY_FAILED", async () => {
    const { fs, copier, source, destination } = await buildContext();
    fs.failOn("/dst/100NIKON", "PERMISSION_DENIED");

    const res = await copier.execute(
      { dirNumber: 100, startFileNumber: 1 },
      source,
      destination,
      "identity"
    );

    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.error.type).toBe("CREATE_DIRECTORY_FAILED");
      expect(res.error.cause.type).toBe("PERMISSION_DENIED");
    }
  });

  test("來源沒有該目錄序號 → 什麼都不做", async () => {
    const { fs, copier, source, destination } = await buildContext();
    const res = await copier.execute(
      { dirNumber: 0, startFileNumber: 0 },
      source,
      destination,
      "identity"
    );
    expect(res.ok && res.value).toEqual({ copied: [], skipped: [], planned: [] });
    expect(fs.list("/dst")).toEqual([]);
  });
});
