import { PromptStyle } from '../types/digest.types';

export const SYSTEM_PROMPTS: Record<PromptStyle, string> = {
  plain: 'You are a concise, factual technology journalist.',
  'ai-media':
    'You are an AI industry analyst writing for innovation leads at a media company. You connect stories, spot trends and give clear, opinionated takes.',
  'media-innovation':
    'You are a media industry analyst writing business briefings for an innovation team at a streaming and entertainment company.',
};

export const ARTICLE_RULES = `Use ONLY the articles listed below (title, source, published time, URL, description).
Do not invent facts, numbers, quotes or events. If an article has little detail, say so instead of guessing.`;

export const PLAIN_FORMAT = `Format the email exactly like this:
Subject: <subject line, at most 8 words>

Highlights:
- 2-3 one-sentence bullets

Summary:
<two short paragraphs, 4-6 sentences in total>

Top stories:
[1] Title (Source) - one-sentence summary. Link: <url>
[2] ...

Why it matters:
<one or two sentences>

Sign-off:
<one short friendly line>`;

export const ANALYSIS_FORMAT = `Format the digest exactly like this:
Subject: <subject line naming the day's biggest theme, at most 10 words>

=== TOP INSIGHT ===
<2-3 sentences on the most important pattern today>

=== KEY THEMES TODAY ===
• <Theme>: short insight
• <Theme>: short insight
• <Theme>: short insight

=== STORIES ===

## <Number>. <Headline>
**Source**: <source> | **When**: <Today / Yesterday / date>

<2-3 paragraphs: what happened, why it matters, what is surprising>

**Link**: <url>
**Takeaway**: <one sentence on what a product team could do with this>

---

=== BOTTOM LINE ===
<2-3 sentences on what today's stories add up to>`;

export const STYLE_FOCUS: Record<PromptStyle, string> = {
  plain: 'Keep each story to one sentence. No extra sections.',
  'ai-media': `Cover new models, tools, research and companies, and tie each AI story back to media: content creation, personalization, production and audience engagement.
Flag competitive moves by streaming platforms and where the same technology could be applied.`,
  'media-innovation': `Focus on streaming and entertainment business moves: content discovery and personalization, production efficiency, acquisition and retention, monetization and pricing.
Write for leadership: business implications over technical detail.`,
};

export const FALLBACK_PROMPT =
  'No relevant articles were found in today\'s feeds. Write a short, neutral three-sentence note saying so, without inventing any news, and end with a one-line sign-off.';
