import { mkdir, readdir } from "node:fs/promises";
import { dirname, join, posix } from "node:path";
import { JSONFile } from "lowdb/node";
import { InputValidationError } from "../errors.js";
import { logger } from "../logger.js";
import { careCaseSchema, type CareCase } from "../schema/careCase.js";
import { assertValid, ROOT_PATH } from "../validation/validate.js";

const RECORD_PATTERN = /^carecase\.[^/]+\.json$/;
const CASE_ID_PATTERN = /^[0-9a-fA-F-]{36}$/;

export interface CaseStoreOptions {
  root: string;
  generatedDir: string;
}

export interface StoredCareCase {
  /** Repository-relative POSIX path of the record. */
  location: string;
  careCase: CareCase;
}

export function recordFileName(caseId: string): string {
  return `carecase.${caseId}.json`;
}

/**
 * One JSON document per care-case under the generated directory. Writes go
 * through lowdb's JSONFile adapter, which writes a temp file and renames it
 * into place, so readers never see a partial record.
 */
export class CaseStore {
  private readonly root: string;
  private readonly generatedDir: string;

  constructor(options: CaseStoreOptions) {
    this.root = options.root;
    this.generatedDir = options.generatedDir;
  }

  locationFor(caseId: string): string {
    return posix.join(this.generatedDir, recordFileName(caseId));
  }

  private absolute(location: string): string {
    return join(this.root, ...location.split("/"));
  }

  async persist(careCase: CareCase): Promise<string> {
    const location = this.locationFor(careCase.id);
    const filePath = this.absolute(location);
    await mkdir(dirname(filePath), { recursive: true });
    await new JSONFile<CareCase>(filePath).write(careCase);

    logger.debug("Persisted care-case", "caseStore", { caseId: careCase.id, location });
    return location;
  }

  async get(caseId: string): Promise<StoredCareCase | null> {
    if (!CASE_ID_PATTERN.test(caseId)) {
      return null;
    }
    const location = this.locationFor(caseId);
    const careCase = await this.read(location);
    return careCase ? { location, careCase } : null;
  }

  /** All records, ordered by location. */
  async list(): Promise<StoredCareCase[]> {
    let entries: string[];
    try {
      entries = await readdir(this.absolute(this.generatedDir));
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        return [];
      }
      throw error;
    }

    const locations = entries
      .filter((name) => RECORD_PATTERN.test(name))
      .map((name) => posix.join(this.generatedDir, name))
      .sort();

    const records: StoredCareCase[] = [];
    for (const location of locations) {
      const careCase = await this.read(location);
      if (careCase) {
        records.push({ location, careCase });
      }
    }
    return records;
  }

  private async read(location: string): Promise<CareCase | null> {
    const label = `Care-Case (${location})`;
    let document: unknown;
    try {
      document = await new JSONFile<unknown>(this.absolute(location)).read();
    } catch (error) {
      if (error instanceof SyntaxError) {
        throw new InputValidationError(label, [{ path: ROOT_PATH, message: `Invalid JSON: ${error.message}` }]);
      }
      throw error;
    }

    if (document === null) {
      return null;
    }
    return assertValid(document, careCaseSchema, label);
  }
}
