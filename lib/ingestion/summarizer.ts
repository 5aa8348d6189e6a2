import { SUMMARY_SPLIT_THRESHOLD } from "@/lib/config/settings"

export interface SummaryModel {
  summarize(text: string): Promise<string>
  mergeSummaries(first: string, second: string): Promise<string>
}

/**
 * Hierarchical summary. Text under the threshold is summarized in one call;
 * longer text is halved at the midpoint, each half summarized recursively and
 * the two summaries merged. Merge inputs are summaries, so they stay small.
 */
export async function recursiveSummarize(
  text: string,
  model: SummaryModel,
  threshold: number = SUMMARY_SPLIT_THRESHOLD
): Promise<string> {
  if (text.length < threshold) {
    return model.summarize(text)
  }
  const mid = Math.floor(text.length / 2)
  const first = await recursiveSummarize(text.slice(0, mid), model, threshold)
  const second = await recursiveSummarize(text.slice(mid), model, threshold)
  return model.mergeSummaries(first, second)
}
