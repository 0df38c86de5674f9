/**
 * Stage prompts. Every kind shares these templates; persona data fills them.
 * Config may override any template per kind using the same {placeholder} names.
 */

import type { Persona } from './personas.js';
import type { DebateStage } from './types.js';

export type TemplateName = DebateStage | 'custom' | 'consultation';
export type PromptTemplates = Partial<Record<TemplateName, string>>;

export interface StageContext {
  stage: DebateStage | 'custom';
  country: string;
  story: string;
  ruleOfThumb: string;
  yourResponse?: string;
  otherResponse?: string;
  yourFeedback?: string;
  otherFeedback?: string;
}

export const DEFAULT_TEMPLATES: Record<TemplateName, string> = {
  initial_decision: `As a representative of {culture} culture, evaluate whether the following behaviour is socially acceptable in {country}.

Cultural background: {background}

Rule of thumb: {ruleOfThumb}
Story: {story}

Answer from your cultural values and your understanding of {country}.
Format: Yes/No/Neither, then explain your reasoning in at most 3 sentences.

Answer:`,

  feedback: `As a representative of {culture} culture, you are discussing with a participant from another cultural background whether this scenario is socially acceptable in {country}.

Cultural background: {background}
Rule of thumb: {ruleOfThumb}
Story: {story}

Your view: {yourResponse}
Their view: {otherResponse}

Give feedback on their view from your cultural values, in at most 3 sentences.

Feedback:`,

  final_decision: `As a representative of {culture} culture, make a final decision based on the whole discussion below.

Cultural background: {background}
Rule of thumb: {ruleOfThumb}
Story: {story}

Discussion:
Your initial view: {yourResponse}
Their initial view: {otherResponse}
Your feedback: {yourFeedback}
Their feedback: {otherFeedback}

Weigh the discussion against your cultural values and give your final judgement.
Answer only: Yes, No or Neither

Final answer:`,

  custom: `As a representative of {culture} culture:

Cultural background: {background}

{prompt}`,

  consultation: `Based on the values and social norms of {culture} culture, answer the following.

Scenario: {scenario}
Question: {question}

Give your cultural perspective and advice.`,
};

/** Replace {name} placeholders; unknown names are left as written. */
export function renderTemplate(template: string, vars: Record<string, string>): string {
  return template.replace(/\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (match, name: string) =>
    Object.prototype.hasOwnProperty.call(vars, name) ? vars[name] : match,
  );
}

export function describePersona(persona: Persona): string {
  const lines = [persona.summary];
  if (persona.values.length > 0) lines.push(`Core values: ${persona.values.join(', ')}.`);
  const norms = Object.entries(persona.norms);
  if (norms.length > 0) {
    lines.push('Social norms:');
    for (const [area, norm] of norms) lines.push(`- ${area}: ${norm}`);
  }
  if (persona.decisionFactors.length > 0) {
    lines.push(`Decision factors: ${persona.decisionFactors.join(', ')}.`);
  }
  return lines.join('\n');
}

export function buildStagePrompt(
  persona: Persona,
  context: StageContext,
  prompt: string,
  overrides: PromptTemplates = {},
): string {
  const template = overrides[context.stage] ?? DEFAULT_TEMPLATES[context.stage];
  return renderTemplate(template, {
    culture: persona.displayName,
    background: describePersona(persona),
    country: context.country,
    story: context.story,
    ruleOfThumb: context.ruleOfThumb,
    yourResponse: context.yourResponse ?? '',
    otherResponse: context.otherResponse ?? '',
    yourFeedback: context.yourFeedback ?? '',
    otherFeedback: context.otherFeedback ?? '',
    prompt,
  });
}

export function buildConsultationPrompt(
  persona: Persona,
  scenario: string,
  question: string,
  overrides: PromptTemplates = {},
): string {
  return renderTemplate(overrides.consultation ?? DEFAULT_TEMPLATES.consultation, {
    culture: persona.displayName,
    scenario,
    question,
  });
}
