/**
 * CSV file sink.
 *
 * prepare() truncates the file and writes the header. Staged lines are
 * appended on commit(), so a rolled-back batch never reaches the file.
 *
 * Output:
 * ```
 * prime_row,hexachordal_combinatorials,tetrachordal_combinatorials,trichordal_combinatorials
 * "0 1 2 3 4 5 6 7 8 9 10 11","I11 P6 RI5","I11 I3 ...","I11 I2 ..."
 * ```
 */

import { constants } from "fs";
import { access, appendFile, writeFile } from "fs/promises";
import { dirname, resolve } from "path";
import type { AnalysisRecord, IAnalysisSink } from "@rowforms/contracts";
import { CSV_HEADER, recordToCsvRow } from "@rowforms/engine";

export class CsvFileSink implements IAnalysisSink {
  readonly target: string;

  private readonly path: string;
  private staged: string[] = [];

  constructor(path: string) {
    this.path = resolve(path);
    this.target = this.path;
  }

  /** True when the output directory exists and is writable */
  async canWrite(): Promise<boolean> {
    try {
      await access(dirname(this.path), constants.W_OK);
      return true;
    } catch {
      return false;
    }
  }

  async prepare(): Promise<void> {
    this.staged = [];
    await writeFile(this.path, `${CSV_HEADER}\n`, "utf-8");
  }

  async write(record: AnalysisRecord): Promise<void> {
    this.staged.push(recordToCsvRow(record));
  }

  async commit(): Promise<void> {
    if (this.staged.length === 0) return;
    await appendFile(this.path, `${this.staged.join("\n")}\n`, "utf-8");
    this.staged = [];
  }

  async rollback(): Promise<void> {
    this.staged = [];
  }

  async close(): Promise<void> {
    this.staged = [];
  }
}
