#!/usr/bin/env node
/**
 * Faculty report — prints how many directory users belong to each
 * faculty. Reads the same LDAP_* settings as the exporter.
 *
 * Usage: npm run faculty-report
 */

import { loadConfig } from "../config.js";
import { LdapFacultyDirectory } from "../directory/ldap-faculty-directory.js";

async function main() {
  const config = loadConfig();
  if (!config.ldap) {
    throw new Error("LDAP_SERVER and LDAP_BASE_DN must be set");
  }

  console.log(`🔎 Searching ${config.ldap.baseDn} on ${config.ldap.server}...`);
  const counts = await new LdapFacultyDirectory(config.ldap).usersByFaculty();

  console.log("Users per faculty:");
  for (const { faculty, count } of counts) {
    console.log(`  ${faculty}: ${count} users`);
  }
}

main().catch((err) => {
  console.error("Faculty report failed:", err);
  process.exit(1);
});
