/**
 * Users-per-faculty rollup from an LDAP directory.
 *
 * Runs one anonymous subtree search per call over LDAPS and counts the
 * entries by their faculty attribute. Entries without the attribute are
 * not counted.
 */

import { Client } from "ldapts";
import type { FacultyCount } from "@usage-exporter/shared";
import type { LdapOptions } from "../config.js";
import type { FacultyDirectory } from "../metrics/usage-collector.js";

/** One search result entry: `dn` plus the requested attributes */
export type LdapEntry = Awaited<ReturnType<Client["search"]>>["searchEntries"][number];

/** `ldaps://host:port`, unless the server is already given as a URL */
export function ldapUrl(options: Pick<LdapOptions, "server" | "port">): string {
  return options.server.includes("://")
    ? options.server
    : `ldaps://${options.server}:${options.port}`;
}

/** First string value of an attribute, matched case-insensitively */
export function attributeValue(entry: LdapEntry, attribute: string): string | null {
  const wanted = attribute.toLowerCase();
  for (const [key, value] of Object.entries(entry)) {
    if (key === "dn" || key.toLowerCase() !== wanted) continue;
    const first = Array.isArray(value) ? value[0] : value;
    if (typeof first === "string") return first || null;
    if (Buffer.isBuffer(first)) return first.toString("utf8") || null;
  }
  return null;
}

/** Count entries per faculty, largest first, ties by name */
export function countByFaculty(entries: LdapEntry[], attribute: string): FacultyCount[] {
  const counts = new Map<string, number>();
  for (const entry of entries) {
    const faculty = attributeValue(entry, attribute);
    if (faculty) counts.set(faculty, (counts.get(faculty) ?? 0) + 1);
  }
  return Array.from(counts, ([faculty, count]) => ({ faculty, count })).sort(
    (a, b) => b.count - a.count || (a.faculty < b.faculty ? -1 : a.faculty > b.faculty ? 1 : 0),
  );
}

export class LdapFacultyDirectory implements FacultyDirectory {
  constructor(private options: LdapOptions) {}

  async usersByFaculty(): Promise<FacultyCount[]> {
    const { options } = this;
    const client = new Client({
      url: ldapUrl(options),
      timeout: options.timeoutMs,
      connectTimeout: options.timeoutMs,
      tlsOptions: {
        ciphers: options.ciphers,
        rejectUnauthorized: options.tlsVerify,
      },
    });

    try {
      const { searchEntries } = await client.search(options.baseDn, {
        scope: "sub",
        filter: options.searchFilter,
        attributes: [options.facultyAttribute],
        paged: true,
      });
      return countByFaculty(searchEntries, options.facultyAttribute);
    } finally {
      await client.unbind();
    }
  }
}
