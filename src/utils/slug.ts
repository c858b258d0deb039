export function generateSlug(name: string): string {
  const suffix = Math.random().toString(36).slice(2, 6);

  const base = name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .replace(/-{2,}/g, '-');

  // Names made only of punctuation or non-latin characters still get a usable slug.
  return `${base || 'item'}-${suffix}`;
}
