export const JOB_CATEGORIES = [
  '💼 Ofis ishi',
  '🏗 Qurilish',
  '🍽 Restoran/Kafe',
  '🚗 Haydovchi',
  '🏥 Tibbiyot',
  '💻 IT',
  "📚 Ta'lim",
  '🔧 Xizmat',
  '🛍 Savdo',
  '🏭 Ishlab chiqarish',
  '🎨 Ijodiy',
  '📞 Call-center',
] as const;

export type JobCategory = (typeof JOB_CATEGORIES)[number];

export function categoryAt(index: number): JobCategory | null {
  if (!Number.isInteger(index) || index < 0 || index >= JOB_CATEGORIES.length) {
    return null;
  }
  return JOB_CATEGORIES[index] ?? null;
}

/** Channel hashtag for a category: emoji dropped, separators become underscores. */
export function categoryHashtag(category: string): string {
  const words = category
    .replace(/[^\p{L}\p{N}\s/'-]/gu, '')
    .trim()
    .split(/[\s/'-]+/)
    .filter(Boolean);
  return `#${words.join('_')}`;
}
