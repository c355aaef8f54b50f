import {
  authProviders,
  generationStatuses,
  matrixStatuses,
  sectionSources,
  subscriptionStatuses,
  syncDirections,
  syncStatuses,
  tcmTools,
  tenantStates,
  tenantTypes,
  userStates,
} from '../schema/enums'
import { oneOf } from './sql-text'
import type { TableDefinition } from './types'

/*
 * DDL for every table, leaves first. Each column sits on its own line; the
 * schema guard reads column names from these statements.
 */

const tenants: TableDefinition = {
  name: 'tenants',
  dependsOn: [],
  sql: `
CREATE TABLE tenants (
    tenant_id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
    tenant_name TEXT NOT NULL,
    tenant_type TEXT NOT NULL ${oneOf('tenant_type', tenantTypes)},
    tenant_state TEXT NOT NULL DEFAULT 'ACTIVE' ${oneOf('tenant_state', tenantStates)},
    primary_domain TEXT,
    created_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP NOT NULL,
    updated_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP NOT NULL
);`,
}

const requirementLabels: TableDefinition = {
  name: 'requirement_labels',
  dependsOn: ['tenants'],
  sql: `
CREATE TABLE requirement_labels (
    label_id SERIAL PRIMARY KEY,
    tenant_id UUID NOT NULL REFERENCES tenants(tenant_id) ON DELETE CASCADE,
    requirement_label VARCHAR(255) NOT NULL,
    created_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP,
    updated_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP,
    UNIQUE(tenant_id, requirement_label)
);`,
}

const users: TableDefinition = {
  name: 'users',
  dependsOn: ['tenants'],
  sql: `
CREATE TABLE users (
    user_id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
    tenant_id UUID NOT NULL REFERENCES tenants(tenant_id) ON DELETE CASCADE,
    email TEXT NOT NULL UNIQUE,
    name TEXT,
    auth_provider TEXT NOT NULL DEFAULT 'GOOGLE' ${oneOf('auth_provider', authProviders)},
    external_subject TEXT,
    state TEXT NOT NULL DEFAULT 'ACTIVE' ${oneOf('state', userStates)},
    created_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP NOT NULL,
    updated_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP NOT NULL
);`,
}

const tcmIntegrations: TableDefinition = {
  name: 'tcm_integrations',
  dependsOn: ['tenants'],
  sql: `
CREATE TABLE tcm_integrations (
    integration_id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
    tenant_id UUID NOT NULL REFERENCES tenants(tenant_id) ON DELETE CASCADE,
    integrator_type VARCHAR(50) NOT NULL ${oneOf('integrator_type', tcmTools)},
    name VARCHAR(255) NOT NULL,
    description TEXT,
    is_active BOOLEAN DEFAULT TRUE,
    created_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP NOT NULL,
    updated_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP NOT NULL
);`,
}

const requirements: TableDefinition = {
  name: 'requirements',
  dependsOn: ['tenants', 'requirement_labels'],
  sql: `
CREATE TABLE requirements (
    requirement_id UUID NOT NULL,
    row_id BIGSERIAL PRIMARY KEY,
    tenant_id UUID NOT NULL REFERENCES tenants(tenant_id) ON DELETE CASCADE,
    label_id INTEGER NOT NULL REFERENCES requirement_labels(label_id) ON DELETE CASCADE,
    title TEXT NOT NULL,
    version INTEGER NOT NULL,
    raw_text TEXT,
    requirement_detail JSON NOT NULL,
    testcase_generation_status TEXT ${oneOf('testcase_generation_status', generationStatuses)} DEFAULT 'NOT_STARTED',
    created_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP,
    updated_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP,
    meta_info JSON,
    UNIQUE(requirement_id, version)
);`,
}

const tcmCredentials: TableDefinition = {
  name: 'tcm_credentials',
  dependsOn: ['tcm_integrations'],
  sql: `
CREATE TABLE tcm_credentials (
    credential_id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
    integration_id UUID NOT NULL REFERENCES tcm_integrations(integration_id) ON DELETE CASCADE,
    base_url TEXT NOT NULL,
    api_key TEXT,
    username TEXT,
    password TEXT,
    created_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP NOT NULL,
    updated_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP NOT NULL,
    CONSTRAINT check_auth_method CHECK (
        (api_key IS NOT NULL AND api_key != '') OR
        (username IS NOT NULL AND username != '' AND password IS NOT NULL AND password != '')
    )
);`,
}

const testcases: TableDefinition = {
  name: 'testcases',
  // derived_from_row_id references testcases itself
  dependsOn: [],
  sql: `
CREATE TABLE testcases (
    testcase_id UUID NOT NULL,
    row_id BIGSERIAL PRIMARY KEY,
    requirement_id UUID NOT NULL,
    title TEXT NOT NULL,
    steps JSON NOT NULL,
    expected_result TEXT NOT NULL,
    status TEXT NOT NULL,
    sync_status TEXT ${oneOf('sync_status', syncStatuses)} DEFAULT 'NEW',
    version INTEGER NOT NULL,
    priority TEXT DEFAULT 'MEDIUM',
    derived_from_row_id BIGINT REFERENCES testcases(row_id),
    created_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP,
    updated_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP,
    meta_info JSON,
    UNIQUE(testcase_id, version)
);`,
}

const sections: TableDefinition = {
  name: 'sections',
  dependsOn: ['tenants'],
  sql: `
CREATE TABLE sections (
    section_id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
    tenant_id UUID NOT NULL REFERENCES tenants(tenant_id) ON DELETE CASCADE,
    section_name TEXT NOT NULL,
    source TEXT ${oneOf('source', sectionSources)} DEFAULT 'internal',
    external_section_id TEXT,
    external_suite_id TEXT,
    description TEXT,
    created_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP,
    UNIQUE(tenant_id, section_name)
);`,
}

const tcmTestcaseMappings: TableDefinition = {
  name: 'tcm_testcase_mappings',
  dependsOn: [],
  sql: `
CREATE TABLE tcm_testcase_mappings (
    mapping_id SERIAL PRIMARY KEY,
    testcase_id UUID NOT NULL,
    tcm_tool TEXT ${oneOf('tcm_tool', tcmTools)} NOT NULL,
    external_testcase_id TEXT NOT NULL,
    sync_direction TEXT ${oneOf('sync_direction', syncDirections)} DEFAULT 'BIDIRECTIONAL',
    last_synced_at TIMESTAMPTZ,
    UNIQUE(testcase_id, tcm_tool)
);`,
}

const testrailProjects: TableDefinition = {
  name: 'testrail_projects',
  dependsOn: ['tcm_integrations'],
  sql: `
CREATE TABLE testrail_projects (
    project_id SERIAL PRIMARY KEY,
    integration_id UUID NOT NULL REFERENCES tcm_integrations(integration_id) ON DELETE CASCADE,
    external_project_id INTEGER NOT NULL,
    project_name VARCHAR(255) NOT NULL,
    project_description TEXT,
    project_mode INTEGER DEFAULT 0,
    is_active BOOLEAN DEFAULT TRUE NOT NULL,
    created_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP NOT NULL,
    last_synced_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP NOT NULL
);`,
}

const testrailSuites: TableDefinition = {
  name: 'testrail_suites',
  dependsOn: ['testrail_projects'],
  sql: `
CREATE TABLE testrail_suites (
    suite_id SERIAL PRIMARY KEY,
    project_id INTEGER NOT NULL REFERENCES testrail_projects(project_id) ON DELETE CASCADE,
    external_suite_id INTEGER NOT NULL,
    suite_name VARCHAR(255) NOT NULL,
    suite_description TEXT,
    is_active BOOLEAN DEFAULT FALSE NOT NULL,
    created_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP NOT NULL,
    last_synced_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP NOT NULL,
    UNIQUE(project_id, external_suite_id)
);`,
}

const zephyrProjects: TableDefinition = {
  name: 'zephyr_projects',
  dependsOn: ['tcm_integrations'],
  sql: `
CREATE TABLE zephyr_projects (
    project_id SERIAL PRIMARY KEY,
    integration_id UUID NOT NULL REFERENCES tcm_integrations(integration_id) ON DELETE CASCADE,
    project_key VARCHAR(50) NOT NULL,
    project_name VARCHAR(255) NOT NULL,
    project_lead VARCHAR(255),
    created_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP NOT NULL,
    last_synced_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP NOT NULL
);`,
}

const xrayProjects: TableDefinition = {
  name: 'xray_projects',
  dependsOn: ['tcm_integrations'],
  sql: `
CREATE TABLE xray_projects (
    project_id SERIAL PRIMARY KEY,
    integration_id UUID NOT NULL REFERENCES tcm_integrations(integration_id) ON DELETE CASCADE,
    project_key VARCHAR(50) NOT NULL,
    project_name VARCHAR(255) NOT NULL,
    project_type VARCHAR(50),
    created_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP NOT NULL,
    last_synced_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP NOT NULL
);`,
}

const testcaseSectionMap: TableDefinition = {
  name: 'testcase_section_map',
  dependsOn: ['sections', 'testcases'],
  sql: `
CREATE TABLE testcase_section_map (
    map_id SERIAL PRIMARY KEY,
    testcase_id UUID NOT NULL,
    section_id UUID NOT NULL REFERENCES sections(section_id) ON DELETE CASCADE,
    linked_at_version INTEGER NOT NULL,
    created_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP,
    UNIQUE(testcase_id, section_id, linked_at_version),
    FOREIGN KEY (testcase_id, linked_at_version)
        REFERENCES testcases(testcase_id, version) ON DELETE CASCADE
);`,
}

const requirementTestcaseMap: TableDefinition = {
  name: 'requirement_testcase_map',
  dependsOn: ['requirements', 'testcases'],
  sql: `
CREATE TABLE requirement_testcase_map (
    id SERIAL PRIMARY KEY,
    requirement_id UUID NOT NULL,
    requirement_version INTEGER NOT NULL,
    testcase_id UUID NOT NULL,
    testcase_version INTEGER NOT NULL,
    linked_at_version INTEGER NOT NULL,
    created_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP,
    UNIQUE(requirement_id, requirement_version, testcase_id, testcase_version),
    FOREIGN KEY (requirement_id, requirement_version)
        REFERENCES requirements(requirement_id, version) ON DELETE CASCADE,
    FOREIGN KEY (testcase_id, testcase_version)
        REFERENCES testcases(testcase_id, version) ON DELETE CASCADE
);`,
}

const traceabilityMatrix: TableDefinition = {
  name: 'traceability_matrix',
  dependsOn: [],
  sql: `
CREATE TABLE traceability_matrix (
    matrix_id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
    requirement_id UUID NOT NULL,
    version INTEGER NOT NULL,
    status TEXT ${oneOf('status', matrixStatuses)} DEFAULT 'NOT_STARTED',
    traceability_data JSON,
    created_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP NOT NULL,
    updated_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP NOT NULL,
    UNIQUE(requirement_id, version)
);`,
}

const plans: TableDefinition = {
  name: 'plans',
  dependsOn: [],
  sql: `
CREATE TABLE plans (
    plan_id SERIAL PRIMARY KEY,
    name VARCHAR(100) NOT NULL UNIQUE,
    description TEXT,
    price VARCHAR(20) NOT NULL DEFAULT '0.00',
    duration VARCHAR(20) NOT NULL DEFAULT 'monthly',
    limits JSON NOT NULL,
    is_active BOOLEAN DEFAULT TRUE NOT NULL,
    created_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP NOT NULL,
    updated_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP NOT NULL
);`,
}

const subscriptions: TableDefinition = {
  name: 'subscriptions',
  dependsOn: ['tenants', 'plans'],
  sql: `
CREATE TABLE subscriptions (
    subscription_id SERIAL PRIMARY KEY,
    tenant_id UUID NOT NULL REFERENCES tenants(tenant_id) ON DELETE CASCADE,
    plan_id INTEGER NOT NULL REFERENCES plans(plan_id),
    status VARCHAR(20) NOT NULL DEFAULT 'ACTIVE' ${oneOf('status', subscriptionStatuses)},
    start_date TIMESTAMPTZ NOT NULL,
    end_date TIMESTAMPTZ,
    auto_renew BOOLEAN DEFAULT TRUE NOT NULL,
    created_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP NOT NULL,
    updated_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP NOT NULL,
    UNIQUE(tenant_id)
);`,
}

const usage: TableDefinition = {
  name: 'usage',
  dependsOn: ['subscriptions'],
  sql: `
CREATE TABLE usage (
    usage_id SERIAL PRIMARY KEY,
    subscription_id INTEGER NOT NULL REFERENCES subscriptions(subscription_id) ON DELETE CASCADE,
    metric VARCHAR(50) NOT NULL,
    used INTEGER NOT NULL DEFAULT 0,
    "limit" INTEGER NOT NULL,
    reset_date TIMESTAMPTZ NOT NULL,
    created_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP NOT NULL,
    updated_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP NOT NULL,
    UNIQUE(subscription_id, metric)
);`,
}

/**
 * Creation order.
 *
 * tenants → {requirement_labels, users, tcm_integrations}
 *   → {requirements, tcm_credentials} → testcases
 *   → {sections, tcm_testcase_mappings, tool project catalogs}
 *   → {testcase_section_map, requirement_testcase_map, traceability_matrix}
 *   → plans → subscriptions → usage
 */
export const tableDefinitions: readonly TableDefinition[] = [
  tenants,
  requirementLabels,
  users,
  tcmIntegrations,
  requirements,
  tcmCredentials,
  testcases,
  sections,
  tcmTestcaseMappings,
  testrailProjects,
  testrailSuites,
  zephyrProjects,
  xrayProjects,
  testcaseSectionMap,
  requirementTestcaseMap,
  traceabilityMatrix,
  plans,
  subscriptions,
  usage,
]

/**
 * Column names declared by a CREATE TABLE statement, in order.
 *
 * Table-level clauses (UNIQUE, FOREIGN KEY, CONSTRAINT) are upper-case and
 * continuation lines start with a parenthesis, so only lower-case leading
 * identifiers count as columns.
 */
export function declaredColumns(definition: TableDefinition): string[] {
  const open = definition.sql.indexOf('(')
  const close = definition.sql.lastIndexOf(')')
  const body = definition.sql.slice(open + 1, close)
  const columns: string[] = []
  for (const rawLine of body.split('\n')) {
    const line = rawLine.trim()
    const match = /^"?([a-z_][a-z0-9_]*)"?\s/.exec(line)
    if (match) columns.push(match[1])
  }
  return columns
}
