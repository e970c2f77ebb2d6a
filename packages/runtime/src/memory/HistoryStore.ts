import { appendFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import type { HistoryRecord, HistorySink } from "../types/index.js";

/**
 * 进程内的运行历史，保留全部记录。
 */
export class InMemoryHistoryStore implements HistorySink {
  private readonly records: HistoryRecord[] = [];

  public async save(record: HistoryRecord): Promise<void> {
    this.records.push(record);
  }

  /** 最近的 n 条记录，按时间先后排列 */
  public getRecentTasks(n = 5): HistoryRecord[] {
    if (n <= 0) {
      return [];
    }
    return this.records.slice(-n);
  }

  public size(): number {
    return this.records.length;
  }
}

/**
 * 每次运行向文件追加一行 JSON。
 */
export class JsonlHistoryStore implements HistorySink {
  constructor(private readonly filePath: string) {}

  public async save(record: HistoryRecord): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    await appendFile(this.filePath, `${JSON.stringify(record)}\n`, "utf-8");
  }
}
