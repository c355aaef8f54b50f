import { checkSchemaAgreement } from "../src/guard";

/**
 * Fails when the typed drizzle tables and the DDL the bootstrap plan runs
 * drift apart. Warnings are printed but do not fail the run.
 */
function main() {
  const findings = checkSchemaAgreement();
  const errors = findings.filter((f) => f.level === "error");
  const warns = findings.filter((f) => f.level === "warn");

  for (const finding of findings) {
    const prefix = finding.level === "error" ? "ERROR" : "WARN ";
    console.log(`${prefix} [${finding.rule}] ${finding.table} -> ${finding.detail}`);
  }

  console.log(`schema-guard: ${errors.length} error(s), ${warns.length} warning(s).`);

  if (errors.length > 0) process.exit(1);
}

main();
