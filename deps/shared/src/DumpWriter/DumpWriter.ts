export interface DumpWriter {
  /**
   * 將資料以 JSON 寫入報告目錄，回傳寫出的檔案路徑。
   */
  dump(name: string, data: unknown): Promise<string>;
}
