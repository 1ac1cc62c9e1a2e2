/**
 * Gantry → section reference map.
 *
 * Loaded once from data/reference/gantry_sections.json. A gantry id embeds
 * its section id as the first 11 characters; the explicit map wins when
 * both are available.
 */

import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

const GantrySectionFileSchema = z.object({
  sections: z.record(z.string()),
  gantries: z.record(z.string()),
});

export type GantrySectionData = z.infer<typeof GantrySectionFileSchema>;

export interface SectionRef {
  section_id: string;
  section_name: string;
}

const SECTION_ID_LENGTH = 11;

/**
 * Resolve apps/api/<...parts>. The same depth holds from src/ and dist/.
 */
export function packagePath(...parts: string[]): string {
  const here = dirname(fileURLToPath(import.meta.url));
  return join(here, "..", "..", "..", ...parts);
}

export class GantrySectionMap {
  private readonly sections: ReadonlyMap<string, string>;
  private readonly gantries: ReadonlyMap<string, string>;

  constructor(data: GantrySectionData) {
    const parsed = GantrySectionFileSchema.parse(data);
    this.sections = new Map(Object.entries(parsed.sections));
    this.gantries = new Map(Object.entries(parsed.gantries));
  }

  static fromFile(filePath = packagePath("data", "reference", "gantry_sections.json")): GantrySectionMap {
    const raw: unknown = JSON.parse(readFileSync(filePath, "utf-8"));
    return new GantrySectionMap(GantrySectionFileSchema.parse(raw));
  }

  gantryIds(): string[] {
    return [...this.gantries.keys()];
  }

  sectionIds(): string[] {
    return [...this.sections.keys()];
  }

  sectionName(sectionId: string): string | undefined {
    return this.sections.get(sectionId);
  }

  /**
   * Section implied by a gantry id, or undefined for an unknown gantry.
   */
  sectionFor(gantryId: string): SectionRef | undefined {
    const mapped = this.gantries.get(gantryId);
    const sectionId = mapped ?? gantryId.slice(0, SECTION_ID_LENGTH);
    const name = this.sections.get(sectionId);
    if (name === undefined) return undefined;
    return { section_id: sectionId, section_name: name };
  }

  /**
   * True when the record's section fields agree with its gantry. Unknown
   * gantries count as consistent: there is nothing to compare against.
   */
  isConsistent(gantryId: unknown, sectionId: unknown, sectionName: unknown): boolean {
    if (typeof gantryId !== "string") return false;
    const expected = this.sectionFor(gantryId);
    if (!expected) return true;
    return expected.section_id === sectionId && expected.section_name === sectionName;
  }
}

let instance: GantrySectionMap | null = null;

export function getGantrySectionMap(): GantrySectionMap {
  if (!instance) {
    instance = GantrySectionMap.fromFile();
  }
  return instance;
}
