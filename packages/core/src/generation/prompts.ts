export const DRAFT_PROMPT = `You are preparing the content of a slide deck about "{{TOPIC}}".

Write {{COUNT}} content slides. For each slide choose one type from: {{SLIDE_TYPES}}.
{{CONTEXT}}

For every slide give:
- the slide type
- a short title
- three to five concise points (for two_column slides, prefix each point with "Column 1:" or "Column 2:")
- an image idea, for content_with_image slides only
- one or two sources a reader could consult

Plain text is fine. Do not add a title slide.`;

export const FORMAT_PROMPT = `Convert the following slide outline about "{{TOPIC}}" into JSON.

Outline:
{{DRAFT}}

Respond with ONLY a JSON object (no markdown, no explanation) shaped like this example:
{{SAMPLE}}

Rules:
- slide_type must be one of: bullet_points, two_column, content_with_image
- content is an array of strings
- image_suggestion is a string for content_with_image slides and null otherwise
- keep the order of the outline`;

export const SAMPLE_OUTPUT = {
  slides: [
    {
      slide_type: "bullet_points",
      title: "Why it matters",
      content: ["First key point", "Second key point", "Supporting detail", "Summary"],
      image_suggestion: null,
      citations: ["Survey of the field (2023)"],
    },
    {
      slide_type: "two_column",
      title: "Options compared",
      content: ["Column 1: Option A", "Column 2: Option B", "Column 1: Cost", "Column 2: Speed"],
      image_suggestion: null,
      citations: ["Comparative study"],
    },
    {
      slide_type: "content_with_image",
      title: "How it fits together",
      content: ["Main idea", "Supporting information", "Context"],
      image_suggestion: "Diagram of the main components",
      citations: ["Reference guide"],
    },
  ],
};

export function buildDraftPrompt(topic: string, count: number, slideTypes: string[], customContent?: string | null): string {
  return DRAFT_PROMPT.replace("{{TOPIC}}", topic)
    .replace("{{COUNT}}", String(count))
    .replace("{{SLIDE_TYPES}}", slideTypes.join(", "))
    .replace("{{CONTEXT}}", customContent ? `Additional context to incorporate: ${customContent}` : "");
}

export function buildFormatPrompt(topic: string, draft: string): string {
  return FORMAT_PROMPT.replace("{{TOPIC}}", topic)
    .replace("{{DRAFT}}", draft)
    .replace("{{SAMPLE}}", JSON.stringify(SAMPLE_OUTPUT, null, 2));
}
