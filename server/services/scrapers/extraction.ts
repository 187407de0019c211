import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { hasChildren, isTag, isText, type AnyNode, type Element } from 'domhandler';
import { cleanText, titleCase } from './normalizer';
import { emptyCandidateFields, type CandidateRecord } from './types';

export const DEFAULT_RESULT_BLOCK_SELECTORS = ['.attorney-result', '.member-listing', '.search-result'];
export const DEFAULT_NAME_SELECTOR = 'h2, h3, h4, a, strong';

const RESULT_TABLE_PATTERN = /result|member|attorney/i;
const RESULT_CONTAINER_PATTERN = /member|attorney|result/i;
const PHONE_PATTERN = /(?:\(\d{3}\)\s*|\b\d{3}[-.\s])\d{3}[-.\s]\d{4}\b/;

// Field labels as they appear at the start of a text node ("Firm:", "Status")
const LABELS = {
  firm: '(?:law\\s+)?(?:firm|company|employer)(?:\\s+name)?',
  status: '(?:bar\\s+|member(?:ship)?\\s+)?status',
  address: '(?:office\\s+|mailing\\s+|street\\s+)?address',
  phone: '(?:tel|telephone|phone)(?:\\s+number)?',
  email: 'e-?mail',
  website: 'web\\s*site|url',
  admissionDate: 'admitted|admission\\s+date|date\\s+admitted|date\\s+licensed|licensed\\s+since',
  lawSchool: 'law\\s+school',
  graduationYear: 'graduat(?:ed|ion)(?:\\s+year)?|grad(?:uation)?\\s+year',
  practiceAreas: 'practice\\s+areas?|areas?\\s+of\\s+practice',
} as const;

export type StrategyKind = 'result-block' | 'result-table' | 'result-container';

export interface StrategyMatch {
  blocks: number;
  candidates: CandidateRecord[];
}

/**
 * One structural way of locating result blocks. Returns null when the page
 * has no such structure; a match (even one whose blocks were all rejected)
 * ends the cascade.
 */
export interface ExtractionStrategy {
  readonly kind: StrategyKind;
  tryExtract($: CheerioAPI): StrategyMatch | null;
}

export interface ExtractionResult {
  strategy: StrategyKind | null;
  blocks: number;
  candidates: CandidateRecord[];
  rejected: number;
  errors: string[];
}

export interface ExtractionOptions {
  resultBlockSelectors?: string[];
  nameSelector?: string;
  barNumberLength?: number;
  knownCities?: readonly string[];
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

function classOrId(element: Element): string {
  return `${element.attribs.class ?? ''} ${element.attribs.id ?? ''}`;
}

/**
 * Text nodes under a node in document order, whitespace-collapsed, empties
 * dropped. Script and style bodies are skipped.
 */
export function textNodes(node: AnyNode, out: string[] = []): string[] {
  if (isText(node)) {
    const text = cleanText(node.data);
    if (text) out.push(text);
  } else if (isTag(node) && (node.name === 'script' || node.name === 'style')) {
    return out;
  } else if (hasChildren(node)) {
    for (const child of node.children) {
      textNodes(child, out);
    }
  }
  return out;
}

/**
 * Value following a label: the text after the label's colon when present,
 * otherwise the next text node.
 */
export function labelledValue(texts: readonly string[], label: string): string | null {
  const pattern = new RegExp(`^(?:${label})\\s*(?::\\s*(.*))?$`, 'i');
  for (let i = 0; i < texts.length; i++) {
    const match = texts[i].match(pattern);
    if (!match) continue;
    const remainder = match[1]?.trim();
    if (remainder) return remainder;
    return texts[i + 1] ?? null;
  }
  return null;
}

export class BlockExtractor {
  private nameSelector: string;
  private barNumberLength: number;
  private knownCities: Set<string>;
  private cityPattern: RegExp | null;

  constructor(options: ExtractionOptions = {}) {
    this.nameSelector = options.nameSelector ?? DEFAULT_NAME_SELECTOR;
    this.barNumberLength = options.barNumberLength ?? 8;

    const cities = (options.knownCities ?? []).map(city => city.trim()).filter(Boolean);
    this.knownCities = new Set(cities.map(titleCase));
    this.cityPattern = cities.length > 0
      ? new RegExp(`\\b(${[...cities].sort((a, b) => b.length - a.length).map(escapeRegExp).join('|')})\\b`, 'i')
      : null;
  }

  extract($: CheerioAPI, element: Element): CandidateRecord | null {
    const block = $(element);

    if (element.name === 'tr' && block.find('td').length < 2) {
      return null;
    }

    const name = cleanText(block.find(this.nameSelector).first().text());
    if (!name) return null;

    const texts = textNodes(element);
    const fields = emptyCandidateFields();

    fields.name = name;
    fields.barNumber = this.findBarNumber($, element, texts);
    fields.city = this.findCity(texts.filter(text => text !== name));
    fields.firm = labelledValue(texts, LABELS.firm);
    fields.status = labelledValue(texts, LABELS.status);
    fields.address = labelledValue(texts, LABELS.address);
    fields.email = this.findEmail($, element, texts);
    fields.phone = labelledValue(texts, LABELS.phone) ?? texts.join(' ').match(PHONE_PATTERN)?.[0] ?? null;
    fields.website = this.findWebsite($, element, texts);
    fields.admissionDate = labelledValue(texts, LABELS.admissionDate);
    fields.lawSchool = labelledValue(texts, LABELS.lawSchool);
    fields.graduationYear = labelledValue(texts, LABELS.graduationYear);

    return { fields, practiceAreas: this.findPracticeAreas($, element, texts) };
  }

  private findBarNumber($: CheerioAPI, element: Element, texts: string[]): string | null {
    // Profile links usually carry the bar number in the query string
    for (const link of $(element).find('a[href]').toArray()) {
      const match = (link.attribs.href ?? '').match(/BarNumber=(\d+)/i);
      if (match) return match[1];
    }

    const digits = this.barNumberLength;
    const text = texts.join(' ');

    const labelled = text.match(new RegExp(`Bar\\s*(?:No\\.?|Number|#)?\\s*:?\\s*(\\d{${digits}})(?!\\d)`, 'i'));
    if (labelled) return labelled[1];

    const standalone = text.match(new RegExp(`(?<!\\d)(\\d{${digits}})(?!\\d)`));
    return standalone ? standalone[1] : null;
  }

  private findCity(texts: string[]): string | null {
    const exact = texts.find(text => this.knownCities.has(titleCase(text)));
    if (exact) return exact;

    if (!this.cityPattern) return null;
    return texts.join(' ').match(this.cityPattern)?.[1] ?? null;
  }

  private findEmail($: CheerioAPI, element: Element, texts: string[]): string | null {
    const mailto = $(element).find('a[href^="mailto:"]').first().attr('href');
    if (mailto) {
      const address = mailto.slice('mailto:'.length).split('?')[0];
      if (address) return safeDecode(address);
    }
    return labelledValue(texts, LABELS.email);
  }

  private findWebsite($: CheerioAPI, element: Element, texts: string[]): string | null {
    const labelled = labelledValue(texts, LABELS.website);
    if (labelled) return labelled;

    const link = $(element)
      .find('a[href]')
      .filter((_, anchor) => /web\s*site/i.test($(anchor).text()))
      .first()
      .attr('href');
    return link ?? null;
  }

  private findPracticeAreas($: CheerioAPI, element: Element, texts: string[]): string[] {
    const listed = $(element)
      .find('[class*="practice"] li, [class*="Practice"] li')
      .toArray()
      .map(item => cleanText($(item).text()))
      .filter((area): area is string => Boolean(area));
    if (listed.length > 0) return listed;

    const labelled = labelledValue(texts, LABELS.practiceAreas);
    if (!labelled) return [];
    return labelled.split(/[,;|]/).map(area => area.trim()).filter(Boolean);
  }
}

function extractBlocks(
  $: CheerioAPI,
  elements: Element[],
  blockExtractor: BlockExtractor
): StrategyMatch | null {
  if (elements.length === 0) return null;

  const candidates: CandidateRecord[] = [];
  for (const element of elements) {
    const candidate = blockExtractor.extract($, element);
    if (candidate) candidates.push(candidate);
  }
  return { blocks: elements.length, candidates };
}

export function resultBlockStrategy(selectors: string[], blockExtractor: BlockExtractor): ExtractionStrategy {
  return {
    kind: 'result-block',
    tryExtract($) {
      return extractBlocks($, $<Element, string>(selectors.join(', ')).toArray(), blockExtractor);
    },
  };
}

export function resultTableStrategy(blockExtractor: BlockExtractor): ExtractionStrategy {
  return {
    kind: 'result-table',
    tryExtract($) {
      const table = $('table').filter((_, element) => RESULT_TABLE_PATTERN.test(classOrId(element))).first();
      if (table.length === 0) return null;

      // First row is the header
      const rows = table.find('tr').toArray().slice(1);
      return extractBlocks($, rows, blockExtractor);
    },
  };
}

export function resultContainerStrategy(
  blockExtractor: BlockExtractor,
  nameSelector: string = DEFAULT_NAME_SELECTOR
): ExtractionStrategy {
  return {
    kind: 'result-container',
    tryExtract($) {
      const matching = $('div').filter((_, element) => RESULT_CONTAINER_PATTERN.test(classOrId(element)));
      const hasName = (element: Element) => $(element).find(nameSelector).length > 0;

      // A container wrapping several named containers is a results list, not a record
      const records = matching.filter((_, element) =>
        $(element).find('div').filter((_, inner) => matching.is(inner) && hasName(inner)).length <= 1
      );

      // Outermost records only
      const containers = records
        .filter((_, element) => $(element).parents('div').filter((_, outer) => records.is(outer)).length === 0)
        .toArray();

      return extractBlocks($, containers, blockExtractor);
    },
  };
}

export class ExtractionPipeline {
  readonly strategies: readonly ExtractionStrategy[];

  constructor(options: ExtractionOptions = {}, strategies?: ExtractionStrategy[]) {
    const blockExtractor = new BlockExtractor(options);
    this.strategies = strategies ?? [
      resultBlockStrategy(options.resultBlockSelectors ?? DEFAULT_RESULT_BLOCK_SELECTORS, blockExtractor),
      resultTableStrategy(blockExtractor),
      resultContainerStrategy(blockExtractor, options.nameSelector),
    ];
  }

  load(html: string): CheerioAPI {
    return cheerio.load(html);
  }

  extract(page: string | CheerioAPI): ExtractionResult {
    const $ = typeof page === 'string' ? this.load(page) : page;
    const errors: string[] = [];

    for (const strategy of this.strategies) {
      let match: StrategyMatch | null;
      try {
        match = strategy.tryExtract($);
      } catch (error) {
        // A bad configured selector only disables its own strategy
        errors.push(`${strategy.kind}: ${error instanceof Error ? error.message : error}`);
        continue;
      }
      if (match === null) continue;

      return {
        strategy: strategy.kind,
        blocks: match.blocks,
        candidates: match.candidates,
        rejected: match.blocks - match.candidates.length,
        errors,
      };
    }

    return { strategy: null, blocks: 0, candidates: [], rejected: 0, errors };
  }
}
