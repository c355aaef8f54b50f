import type { IndexDefinition } from './types'

const on = (table: string, ...columns: string[]) => ({ table, columns })

/** Non-unique lookup indexes: foreign keys, ids, status and external keys. */
const lookupIndexes: IndexDefinition[] = [
  { name: 'idx_requirement_labels_tenant_id', ...on('requirement_labels', 'tenant_id') },
  { name: 'idx_requirement_labels_name', ...on('requirement_labels', 'requirement_label') },

  { name: 'idx_requirements_requirement_id', ...on('requirements', 'requirement_id') },
  { name: 'idx_requirements_label_id', ...on('requirements', 'label_id') },
  { name: 'idx_requirements_tenant_id', ...on('requirements', 'tenant_id') },
  { name: 'idx_requirements_version', ...on('requirements', 'requirement_id', 'version') },
  { name: 'idx_requirements_label_id_version', ...on('requirements', 'label_id', 'version') },

  { name: 'idx_testcases_testcase_id', ...on('testcases', 'testcase_id') },
  { name: 'idx_testcases_requirement_id', ...on('testcases', 'requirement_id') },
  { name: 'idx_testcases_version', ...on('testcases', 'testcase_id', 'version') },
  { name: 'idx_testcases_derived_from', ...on('testcases', 'derived_from_row_id') },
  { name: 'idx_testcases_req_id_version', ...on('testcases', 'requirement_id', 'version') },

  { name: 'idx_sections_tenant_id', ...on('sections', 'tenant_id') },
  { name: 'idx_sections_name', ...on('sections', 'section_name') },
  { name: 'idx_tsm_testcase_id', ...on('testcase_section_map', 'testcase_id') },
  { name: 'idx_tsm_section_id', ...on('testcase_section_map', 'section_id') },

  { name: 'idx_map_requirement_id', ...on('requirement_testcase_map', 'requirement_id') },
  { name: 'idx_map_testcase_id', ...on('requirement_testcase_map', 'testcase_id') },
  {
    name: 'idx_map_requirement_version',
    ...on('requirement_testcase_map', 'requirement_id', 'requirement_version'),
  },
  {
    name: 'idx_map_testcase_version',
    ...on('requirement_testcase_map', 'testcase_id', 'testcase_version'),
  },

  { name: 'idx_users_tenant_id', ...on('users', 'tenant_id') },
  { name: 'idx_users_email', ...on('users', 'email') },
  { name: 'idx_users_auth_provider', ...on('users', 'auth_provider') },

  { name: 'idx_tcm_integrations_tenant_id', ...on('tcm_integrations', 'tenant_id') },
  { name: 'idx_tcm_integrations_integrator_type', ...on('tcm_integrations', 'integrator_type') },
  { name: 'idx_tcm_credentials_integration_id', ...on('tcm_credentials', 'integration_id') },

  { name: 'idx_testrail_projects_integration_id', ...on('testrail_projects', 'integration_id') },
  { name: 'idx_testrail_projects_external_id', ...on('testrail_projects', 'external_project_id') },
  { name: 'idx_testrail_projects_is_active', ...on('testrail_projects', 'is_active') },
  { name: 'idx_testrail_projects_mode', ...on('testrail_projects', 'project_mode') },

  { name: 'idx_testrail_suites_project_id', ...on('testrail_suites', 'project_id') },
  { name: 'idx_testrail_suites_external_id', ...on('testrail_suites', 'external_suite_id') },
  { name: 'idx_testrail_suites_is_active', ...on('testrail_suites', 'is_active') },

  { name: 'idx_zephyr_projects_integration_id', ...on('zephyr_projects', 'integration_id') },
  { name: 'idx_zephyr_projects_project_key', ...on('zephyr_projects', 'project_key') },

  { name: 'idx_xray_projects_integration_id', ...on('xray_projects', 'integration_id') },
  { name: 'idx_xray_projects_project_key', ...on('xray_projects', 'project_key') },

  { name: 'idx_tcm_tc_mappings_tool', ...on('tcm_testcase_mappings', 'tcm_tool') },
  { name: 'idx_tcm_tc_mappings_external', ...on('tcm_testcase_mappings', 'external_testcase_id') },

  { name: 'idx_traceability_matrix_requirement_id', ...on('traceability_matrix', 'requirement_id') },
  { name: 'idx_traceability_matrix_version', ...on('traceability_matrix', 'version') },
  { name: 'idx_traceability_matrix_status', ...on('traceability_matrix', 'status') },

  { name: 'idx_plans_name', ...on('plans', 'name') },
  { name: 'idx_plans_is_active', ...on('plans', 'is_active') },
  { name: 'idx_subscriptions_tenant_id', ...on('subscriptions', 'tenant_id') },
  { name: 'idx_subscriptions_plan_id', ...on('subscriptions', 'plan_id') },
  { name: 'idx_subscriptions_status', ...on('subscriptions', 'status') },
  { name: 'idx_usage_subscription_id', ...on('usage', 'subscription_id') },
  { name: 'idx_usage_metric', ...on('usage', 'metric') },
  { name: 'idx_usage_reset_date', ...on('usage', 'reset_date') },
]

/** Natural keys scoped by tenant, provider or tool. */
const uniqueIndexes: IndexDefinition[] = [
  {
    name: 'ux_tenants_primary_domain',
    ...on('tenants', 'primary_domain'),
    unique: true,
    where: 'primary_domain IS NOT NULL',
  },
  {
    name: 'ux_users_provider_subject',
    ...on('users', 'auth_provider', 'external_subject'),
    unique: true,
    where: 'external_subject IS NOT NULL',
  },
  { name: 'ux_sections_tenant_name', ...on('sections', 'tenant_id', 'section_name'), unique: true },
  {
    name: 'ux_tsm_testcase_section',
    ...on('testcase_section_map', 'testcase_id', 'section_id'),
    unique: true,
  },
  {
    name: 'ux_tcm_tc_map_testcase_tool',
    ...on('tcm_testcase_mappings', 'testcase_id', 'tcm_tool'),
    unique: true,
  },
]

export const indexDefinitions: readonly IndexDefinition[] = [...lookupIndexes, ...uniqueIndexes]

export function renderIndex(index: IndexDefinition): string {
  const kind = index.unique ? 'CREATE UNIQUE INDEX' : 'CREATE INDEX'
  const where = index.where ? ` WHERE ${index.where}` : ''
  return `${kind} ${index.name} ON ${index.table}(${index.columns.join(', ')})${where};`
}
