/** Run ids travel to shard workers and into sink events, so they stay filename- and header-safe. */
export function createRunId(now = new Date(), random: () => number = Math.random): string {
  const suffix = random().toString(36).slice(2, 8).padEnd(6, "0");
  return `extract_${now.toISOString().replace(/[:.]/g, "-")}_${suffix}`;
}
