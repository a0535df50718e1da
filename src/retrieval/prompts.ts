/**
 * Re-ranking prompt for schedule search results.
 */

export const RERANK_PROMPT = `You are a re-ranker for conference schedule search results.
Given a user query and a list of retrieved schedule entries (each with index, title, room, track, and excerpt):
1. Score how relevant each entry is to the query, from 0 to 10.
2. Leave out entries that are clearly irrelevant (score 0-3).
3. List the remaining entries most relevant first.

Respond with ONLY a JSON object of this shape, no markdown:
{"results": [{"index": 2, "score": 9, "reason": "direct match"}, {"index": 0, "score": 5, "reason": "related track"}]}

"index" is the entry's original index. "reason" is one short phrase.
If nothing is relevant, respond with {"results": []}.`;
