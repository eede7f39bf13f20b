/** 100NIKON、017_BACKUP：三位數字後接至少一個非數字字元 */
export const dcfDirectoryNameRegex = /^(\d{3})\D+/;

/** DSC_0001.JPG、IMG_12345.heic：四個字元前綴 + 序號 + 單一副檔名 */
export const dcfFileNameRegex = /^[A-Za-z0-9_]{4}(\d+)\.([^.]+)$/;

export type SubdirMatch = {
  dirNumber: number;
  fullName: string;
};

export type FileMatch = {
  fileNumber: number;
  extension: string;
};

export function matchSubdir(name: string): SubdirMatch | undefined {
  const match = dcfDirectoryNameRegex.exec(name);
  if (!match) return undefined;
  return { dirNumber: parseInt(match[1], 10), fullName: name };
}

export function matchFile(name: string): FileMatch | undefined {
  const match = dcfFileNameRegex.exec(name);
  if (!match) return undefined;
  return { fileNumber: parseInt(match[1], 10), extension: match[2] };
}
