/**
 * Prompts for ingestion and retrieval.
 */

export const SYSTEM_PROMPTS = {
  default: "You are a helpful assistant.",

  /** Short-query expansion before retrieval. */
  queryExpander: "You are a semantic query expander. Return ONLY the broad question.",

  /** Primary entity / concept extraction from a question. */
  entityExtractor:
    "You are a precise entity and concept extractor. Return ONLY a JSON array of at most 3 names " +
    '(e.g. ["Requirements Analysis", "Security"]). If there is nothing to extract, return None. Do not explain.',

  /** Per-chunk knowledge graph extraction (JSON mode). */
  graphExtractor: `You are a Knowledge Graph Engineer. Output a VALID JSON object containing a list of entities and a list of relationships.
Rules:
1. **Entities**: Extract People, Organizations, Locations, Projects, Key Concepts, Technical Terms, Processes, Methodologies etc.
2. **Relationships**: Use specific verbs (e.g., "MANAGED_BY", "LOCATED_IN", "RELATES_TO", "PART_OF").
Output Format:
{
  "entities": [{"name": "Entity Name", "type": "PERSON/ORG/CONCEPT"}],
  "relationships": [{"source": "Entity Name", "target": "Entity Name", "relation": "RELATION_TYPE"}]
}`,
} as const

/** Literal reply meaning "no entity in this question". */
export const NO_ENTITY_SENTINEL = "none"

export const NOT_FOUND_ANSWER = "I cannot find the answer in the provided documents."

export function buildRefinePrompt(query: string): string {
  return (
    "The user provided a short, ambiguous search term for a RAG system. " +
    "Expand this term into a broad question that asks for 'definitions, categories, or examples' of the term within the document. " +
    "Avoid assuming a specific industry or domain. " +
    `Term: '${query}'`
  )
}

export function buildEntityPrompt(query: string): string {
  return (
    "Analyze the following query and extract up to three of the most relevant primary entities " +
    "(Person, Organization, Project) or Key Concepts (Technical Term, Process). " +
    `If none, return 'None'. Query: '${query}'`
  )
}

export function buildSummaryPrompt(text: string): string {
  return `You are an expert technical writer.
Your task is to provide a comprehensive summary of the document provided below.
Requirements:
1. Identify the main Subject, Key Entities (People, Companies), and Dates.
2. Summarize the core purpose of the document.
3. Keep it dense and factual (approx. 200 words).

Document Text:
${text}
`
}

export function buildMergeSummariesPrompt(first: string, second: string): string {
  return `Merge these two summaries:\n1. ${first}\n2. ${second}`
}

export function buildContextualHeaderPrompt(docSummary: string, chunkText: string): string {
  return `<document_context>
${docSummary}
</document_context>
<chunk_content>
${chunkText}
</chunk_content>
Task: Write a brief **"Contextual Header"** (1-2 sentences) that explains what this specific chunk is about *in the context of the whole document*.
Your Header:
`
}

export function buildGraphExtractionPrompt(text: string): string {
  return `Analyze the following text and extract the knowledge graph:\n${text}\n`
}

export interface SynthesisPromptInput {
  originalQuery: string
  refinedQuery: string
  /** Pre-formatted relationships, or null when the graph stage did not run. */
  graphContext: string | null
  /** Pre-formatted passages. */
  passages: string
  modeLabel: string
}

export function buildSynthesisPrompt(input: SynthesisPromptInput): string {
  return `You are a helpful assistant.
Answer the user's query mostly based on the provided Context.

- If the Context mentions the term, summarize its usage, examples, or categories found.
- If the answer is NOT in the Context, say "${NOT_FOUND_ANSWER}"
- Cite the source filename if possible.

Original Query: ${input.originalQuery}
Refined Intent: ${input.refinedQuery}

[Graph Relationships]
${input.graphContext ?? "N/A"}

[Relevant Knowledge (${input.modeLabel})]
${input.passages}

Your Answer:
`
}
