/** 目錄序號與檔案序號組成的最高水位，例如 101NIKON/DSC_0003.JPG → (101, 3) */
export type HighWaterMark = {
  dirNumber: number;
  fileNumber: number;
};

/**
 * 一個目錄內連續的檔案序號區間（含頭尾）。
 * endFileNumber 為 undefined 表示一路複製到來源目錄的最後一個序號。
 */
export type CopyTask = {
  dirNumber: number;
  startFileNumber: number;
  endFileNumber?: number;
};
