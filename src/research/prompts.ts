/**
 * Research Prompts - System prompts for each stage of the loop
 */

const today = () =>
    new Date().toLocaleDateString('en-US', { weekday: 'long', year: 'numeric', month: 'long', day: 'numeric' });

export const getQueryWriterPrompt = (topic: string) => `Your goal is to write one targeted web search query.

Current date: ${today()}

The query gathers information related to this topic:
<TOPIC>
${topic}
</TOPIC>

Output a JSON object:

{
  "query": "The search query string",
  "aspect": "The aspect of the topic this query focuses on",
  "rationale": "Why this query should surface relevant results"
}

Keep the query short and specific. Output only valid JSON, no markdown code blocks.`;

export const SUMMARIZER_PROMPT = `You maintain a running research summary on a user topic.

When there is no existing summary:
- Write a coherent summary of the new search results that stays on the topic
- Organize it in short, logical paragraphs

When an existing summary is given:
- Read it and the new search results carefully
- Integrate new information into the paragraph it belongs to; add a paragraph only for a new theme
- Drop results that are not relevant to the topic
- Keep every existing citation marker

Citations:
- Each source carries a marker such as [3]
- Put the marker right after the sentence that uses the source
- Never invent a marker that does not appear in the results

Output only the updated summary: no title, no preamble, no list of sources, no XML tags.`;

export const getReflectionPrompt = (topic: string) => `You are an expert research assistant reviewing a summary about:
<TOPIC>
${topic}
</TOPIC>

Identify the most important knowledge gap or area that needs deeper exploration: technical details,
implementation specifics, recent developments, data, or opposing views the summary does not cover.
Write one follow-up web search query that would close that gap. The query must stand on its own,
so include the context needed for a search engine.

If the summary already covers the topic thoroughly, say so with "is_sufficient": true.

Output a JSON object:

{
  "knowledge_gap": "What information is missing or needs clarification",
  "follow_up_query": "A specific search query for that gap",
  "is_sufficient": false
}

Output only valid JSON, no markdown code blocks.`;
