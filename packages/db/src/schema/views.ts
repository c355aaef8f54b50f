import { pgView, text, uuid } from "drizzle-orm/pg-core";

/**
 * requirement_sections_v
 *
 * Read-only projection answering "which sections does a requirement's test
 * content touch" (requirement_testcase_map → testcase_section_map → sections).
 * Created by the bootstrap plan, so drizzle only reads it.
 */
export const requirementSectionsView = pgView("requirement_sections_v", {
  requirementId: uuid("requirement_id").notNull(),
  sectionId: uuid("section_id").notNull(),
  sectionName: text("section_name").notNull(),
}).existing();

export type RequirementSection = typeof requirementSectionsView.$inferSelect;
