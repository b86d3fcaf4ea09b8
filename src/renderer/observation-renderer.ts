/**
 * Observation Renderer
 *
 * Plain-text view of an observation for agent prompts.
 */

import type { InputElementRecord, SelectElementRecord } from '../reduction/reduction.types.js';
import type { Observation } from '../environment/environment.types.js';

export interface RenderOptions {
  /** Truncate the VISIBLE TEXT section to this many characters */
  maxVisibleTextChars?: number;
}

export const EMPTY_OBSERVATION_TEXT = 'No interactive elements found on the page.';

const ENTITIES: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
};

/**
 * Text of serialized markup: script/style content and tags removed,
 * entities decoded, whitespace collapsed.
 */
export function extractVisibleText(html: string): string {
  return html
    .replace(/<script[^>]*>[\s\S]*?<\/script>/gi, '')
    .replace(/<style[^>]*>[\s\S]*?<\/style>/gi, '')
    .replace(/<[^>]+>/g, ' ')
    .replace(/&(?:amp|lt|gt|quot);/g, (entity) => ENTITIES[entity] ?? entity)
    .replace(/\s+/g, ' ')
    .trim();
}

function describeInput(input: InputElementRecord): string {
  let desc = `  - ${input.id} (type: ${input.type}`;
  if (input.value) desc += `, current value: '${input.value}'`;
  if (input.isFocused) desc += ', focused';
  if (!input.canEdit) desc += ', read-only';
  return `${desc})`;
}

function describeSelect(select: SelectElementRecord): string {
  let desc = `  - ${select.id} (value: '${select.value}', selected index: ${select.selectedIndex}`;
  if (select.multiple) desc += `, multiple: [${select.selectedValues.join(', ')}]`;
  return `${desc})`;
}

/**
 * Element sections and visible text.
 */
export function renderElementSections(observation: Observation, options: RenderOptions = {}): string {
  const parts: string[] = [];

  if (observation.clickable_elements.length > 0) {
    parts.push('CLICKABLE ELEMENTS:');
    for (const id of observation.clickable_elements) parts.push(`  - ${id} (clickable)`);
  }

  if (observation.hoverable_elements.length > 0) {
    parts.push('\nHOVERABLE ELEMENTS (may have tooltips/dropdowns):');
    for (const id of observation.hoverable_elements) parts.push(`  - ${id} (hoverable)`);
  }

  if (observation.input_elements.length > 0) {
    parts.push('\nINPUT ELEMENTS:');
    for (const input of observation.input_elements) parts.push(describeInput(input));
  }

  if (observation.select_elements.length > 0) {
    parts.push('\nSELECT ELEMENTS:');
    for (const select of observation.select_elements) parts.push(describeSelect(select));
  }

  let text = extractVisibleText(observation.html);
  if (options.maxVisibleTextChars !== undefined && text.length > options.maxVisibleTextChars) {
    text = `${text.slice(0, options.maxVisibleTextChars)}...`;
  }
  if (text) {
    parts.push(`\nVISIBLE TEXT:\n${text}`);
  }

  return parts.length > 0 ? parts.join('\n') : EMPTY_OBSERVATION_TEXT;
}

/**
 * Full observation message: page header, status lines, then sections.
 */
export function renderObservationText(observation: Observation, options: RenderOptions = {}): string {
  const parts: string[] = [];

  if (observation.tabs.length > 0) {
    const current = observation.tabs.find((tab) => tab.is_active) ?? observation.tabs[0];
    parts.push(`CURRENT PAGE: ${current.url}`);
    parts.push(`PAGE TITLE: ${current.title}`);
    if (observation.tabs.length > 1) {
      parts.push(`OPEN TABS: ${observation.tabs.length}`);
    }
  }

  if (observation.error) {
    parts.push(`ERROR: ${observation.error}`);
  }

  if (observation.terminated) {
    parts.push('STATUS: Task terminated');
    if (observation.model_answer) {
      parts.push(`FINAL ANSWER: ${observation.model_answer}`);
    }
  }

  parts.push(`\n${renderElementSections(observation, options)}`);
  return parts.join('\n');
}
