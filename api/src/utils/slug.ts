/**
 * URL Slugs
 */

export function slugify(value: string): string {
  return value
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

/**
 * First slug derived from `name` that is not in `used`: base, base-1, base-2, ...
 */
export function nextUniqueSlug(name: string, used: Iterable<string>): string {
  const taken = used instanceof Set ? used : new Set(used);
  const base = slugify(name) || 'item';
  if (!taken.has(base)) return base;

  let suffix = 1;
  while (taken.has(`${base}-${suffix}`)) {
    suffix += 1;
  }
  return `${base}-${suffix}`;
}

/**
 * Slugs for a batch of names; each generated slug is reserved for the rest of the batch
 */
export function assignSlugs(names: string[], used: Iterable<string>): string[] {
  const taken = new Set(used);
  return names.map((name) => {
    const slug = nextUniqueSlug(name, taken);
    taken.add(slug);
    return slug;
  });
}
