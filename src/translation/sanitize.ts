import { translationLabel } from '../llm/prompts';

/**
 * Phrases that open a paragraph of commentary about the translation rather than
 * the translation itself. A heuristic: extend it when adding languages.
 */
export const EXPLANATION_LEAD_INS: readonly string[] = [
  'This translation',
  'The translation',
  'can be translated',
  'is in accordance',
  'maintaining the same',
  'Additionally',
  'consistent with',
  'Esta tradução',
  'A tradução',
  'pode ser traduzido',
  'está de acordo',
  'mantendo o mesmo',
  'Além disso',
  'consistente com',
  'La traduction',
  'La traducción',
  'Die Übersetzung',
  'La traduzione',
  'Перевод',
  '翻訳',
  '번역',
  '翻译',
  'الترجمة',
  'अनुवाद',
];

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const EXPLANATION_PATTERN = new RegExp(
  `\\n\\n[\\s\\S]*?(?:${EXPLANATION_LEAD_INS.map(escapeRegExp).join('|')})[\\s\\S]*$`,
  'iu'
);

/**
 * Joins the lines around blank lines with a single line break.
 * A blank line ends an SRT block, so entry text must never contain one.
 */
export function collapseBlankLines(text: string): string {
  return text.replace(/\n(?:[ \t]*\n)+/g, '\n');
}

/**
 * Cleans a raw model reply down to the translated text.
 * Drops an echoed "<TARGET> TRANSLATION:" label at the start, then everything from
 * the first paragraph break followed by an explanatory lead-in, then collapses
 * any blank lines left inside the text.
 * @param response - Raw reply text
 * @param targetLanguage - Display name of the target language
 * @returns The translation, possibly empty
 */
export function sanitizeTranslation(response: string, targetLanguage: string): string {
  const labelPattern = new RegExp(`^\\s*${escapeRegExp(translationLabel(targetLanguage))}\\s*`, 'iu');

  const cleaned = response
    .replace(/\r\n?/g, '\n')
    .replace(labelPattern, '')
    .replace(EXPLANATION_PATTERN, '')
    .trim();

  return collapseBlankLines(cleaned);
}
