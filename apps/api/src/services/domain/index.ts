/**
 * Domain - Main Export
 */

export * from "./constants.js";
export * from "./rng.js";
export * from "./time.js";
export * from "./vehicle.js";
export * from "./tariff.js";
export * from "./labels.js";
export { GantrySectionMap, getGantrySectionMap, packagePath, type GantrySectionData, type SectionRef } from "./gantry_sections.js";
export { SectionDateMap, dayOf } from "./section_dates.js";
