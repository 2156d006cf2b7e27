/** 原始檔案存取；錯誤一律轉成 FileNotFoundError / FilePermissionError */
export interface FileSourcePort {
  fileExists(filePath: string): Promise<boolean>;
  readFile(filePath: string): Promise<Uint8Array>;
  /** 遞迴列出指定副檔名的檔案（略過隱藏目錄） */
  listFiles(rootDir: string, extensions: readonly string[]): Promise<string[]>;
}
