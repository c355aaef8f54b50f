/**
 * Trigger functions and triggers.
 *
 * Functions use `CREATE OR REPLACE` because `DROP TABLE ... CASCADE` removes
 * the triggers but leaves the functions behind between runs.
 */

/** Tables whose `updated_at` is stamped on every UPDATE. */
export const auditedTables = [
  'requirement_labels',
  'requirements',
  'testcases',
  'tenants',
  'users',
  'tcm_integrations',
  'tcm_credentials',
  'traceability_matrix',
  'plans',
  'subscriptions',
  'usage',
] as const

export const updatedAtFunction = `
CREATE OR REPLACE FUNCTION update_updated_at_column()
RETURNS TRIGGER AS $$
BEGIN
    NEW.updated_at = CURRENT_TIMESTAMP;
    RETURN NEW;
END;
$$ LANGUAGE plpgsql;`

export function updatedAtTrigger(table: string): string {
  return `CREATE TRIGGER update_${table}_updated_at BEFORE UPDATE ON ${table} FOR EACH ROW EXECUTE FUNCTION update_updated_at_column();`
}

/**
 * Deleting a TCM mapping removes the testcase's links into sections that
 * came from the same tool. Links into `internal` sections, or sections of
 * another tool, stay.
 */
export const tcmMappingCleanupFunction = `
CREATE OR REPLACE FUNCTION cascade_delete_section_links_for_tcm()
RETURNS TRIGGER AS $$
BEGIN
    DELETE FROM testcase_section_map m
    USING sections s
    WHERE m.section_id = s.section_id
      AND m.testcase_id = OLD.testcase_id
      AND s.source = OLD.tcm_tool;
    RETURN NULL;
END;
$$ LANGUAGE plpgsql;`

export const dropTcmMappingCleanupTrigger =
  'DROP TRIGGER IF EXISTS trg_cascade_tcm_mapping_delete ON tcm_testcase_mappings;'

export const tcmMappingCleanupTrigger = `
CREATE TRIGGER trg_cascade_tcm_mapping_delete
AFTER DELETE ON tcm_testcase_mappings
FOR EACH ROW
EXECUTE FUNCTION cascade_delete_section_links_for_tcm();`
