/**
 * Prompt templates for the generative-query service.
 *
 * @module clients/prompts
 */

/** Upper bound on derived categories */
export const MAX_CATEGORIES = 6;

export function buildCategoryPrompt(eventDescription: string): string {
  return `You are an expert event planner. Identify the kinds of local vendors needed to run the event described below.

EVENT DESCRIPTION: "${eventDescription}"

Rules:
- Return between 1 and ${MAX_CATEGORIES} vendor categories
- Use short, searchable category names (e.g. "balloon decorator", "caterer", "photographer", "banquet hall")
- Only include vendors the event actually needs
- No duplicates

Respond with ONLY a JSON object in this exact format:
{"categories": ["category one", "category two"]}`;
}

export function buildQueryPrompt(eventDescription: string, category: string): string {
  return `You are an expert event planner. Write one concise search query for finding "${category}" vendors for the event below.

EVENT DESCRIPTION: "${eventDescription}"

Rules:
- Capture the event type, theme and scale where they matter to a ${category}
- Use keywords vendors would use to describe their own services
- Do not include a city or area name
- 3 to 10 words

Examples:
- Birthday party for a 5-year-old with a superhero theme, category "decorator": "superhero themed kids birthday party decoration"
- Corporate conference for 200 people, category "caterer": "corporate conference catering for 200 guests"

Return ONLY the search query, nothing else.`;
}
