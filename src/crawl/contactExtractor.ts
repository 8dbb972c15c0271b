import type { ExtractedContacts } from "../types";

const EMAIL_PATTERN = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;
// At least 8 characters. Dates and order numbers match too.
const PHONE_PATTERN = /\+?\d[\d\s().-]{6,}\d/g;
const OBFUSCATED_EMAIL_PATTERN =
  /([a-zA-Z0-9._%+-]+)\s*(?:\(|\[)?at(?:\)|\])?\s*([a-zA-Z0-9.-]+)\s*(?:\(|\[)?dot(?:\)|\])?\s*([a-zA-Z]{2,})/gi;

function sortedUnique(values: Iterable<string>): string[] {
  return [...new Set(values)].sort();
}

export function extractContacts(text: string): ExtractedContacts {
  const emails = new Set<string>();
  for (const match of text.matchAll(EMAIL_PATTERN)) {
    emails.add(match[0]);
  }

  for (const match of text.matchAll(OBFUSCATED_EMAIL_PATTERN)) {
    const [, user, domain, tld] = match;
    emails.add(`${user}@${domain}.${tld}`);
  }

  const phones = new Set<string>();
  for (const match of text.matchAll(PHONE_PATTERN)) {
    phones.add(match[0].trim());
  }

  return {
    emails: sortedUnique(emails),
    phones: sortedUnique(phones),
  };
}

export function mergeContacts(left: ExtractedContacts, right: ExtractedContacts): ExtractedContacts {
  return {
    emails: sortedUnique([...left.emails, ...right.emails]),
    phones: sortedUnique([...left.phones, ...right.phones]),
  };
}
