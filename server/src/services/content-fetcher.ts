/**
 * Page retrieval and text extraction
 *
 * Pulls the parts of an organization's site that describe what it does:
 * title, meta description, "about" sections (or the infobox facts and lead
 * paragraphs on Wikipedia) and the Readability main text. When the home page has no about
 * section, one same-site about link is followed.
 */

import { Readability } from '@mozilla/readability';
import { parseHTML } from 'linkedom';
import { createLogger } from '../logger.js';
import { FetchError, errorMessage } from '../errors.js';
import type { HttpFetcher } from './http-client.js';

const logger = createLogger('content-fetcher');

// Matched against id/class attributes and link paths
const ABOUT_MARKERS = [
  'about',
  'who-we-are',
  'our-story',
  'mission',
  'sobre',
  'quienes-somos',
  'quem-somos',
  'a-propos',
  'apropos',
  'qui-sommes',
  'ueber-uns',
  'uber-uns',
  'chi-siamo',
  'over-ons',
  'om-oss',
];

// Matched against heading and link text
const ABOUT_PHRASES = [
  'about us',
  'about',
  'who we are',
  'our story',
  'sobre nosotros',
  'sobre nós',
  'quienes somos',
  'quem somos',
  'à propos',
  'qui sommes-nous',
  'über uns',
  'chi siamo',
  'over ons',
  'om oss',
];

// Wikipedia infobox rows worth passing to the classifier; matched as substrings of the row header
const INFOBOX_FIELDS = [
  'type',
  'industry',
  'founded',
  'headquarters',
  'founder',
  'products',
  'services',
  'revenue',
  'employees',
  'website',
];
const MAX_INFOBOX_FIELDS = 5;
const MAX_INFOBOX_VALUE_LENGTH = 200;

const MAX_ABOUT_SECTIONS = 3;
const MAX_SECTION_LENGTH = 5000;
const MIN_SECTION_LENGTH = 40;

export interface ExtractedPage {
  title: string;
  description: string;
  aboutSections: string[];
  mainText: string;
  aboutLink: string | null;
}

export interface PageTextSource {
  fetch(url: string, organizationName: string): Promise<string>;
}

export function cleanText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function isWikipedia(pageUrl: string): boolean {
  try {
    return new URL(pageUrl).hostname.endsWith('wikipedia.org');
  } catch {
    return false;
  }
}

type ParsedDocument = ReturnType<typeof parseHTML>['document'];

function metaContent(document: ParsedDocument): string {
  const selectors = ['meta[name="description"]', 'meta[property="og:description"]', 'meta[name="twitter:description"]'];
  for (const selector of selectors) {
    const content = document.querySelector(selector)?.getAttribute('content');
    if (content && cleanText(content)) {
      return cleanText(content);
    }
  }
  return '';
}

function addSection(sections: string[], text: string): void {
  if (text.length < MIN_SECTION_LENGTH || text.length > MAX_SECTION_LENGTH) return;
  if (sections.some((existing) => existing.includes(text) || text.includes(existing))) return;
  sections.push(text);
}

function findAboutSections(document: ParsedDocument): string[] {
  const sections: string[] = [];

  for (const element of document.querySelectorAll('section, article, div, aside')) {
    if (sections.length >= MAX_ABOUT_SECTIONS) break;
    const marker = `${element.getAttribute('id') ?? ''} ${element.getAttribute('class') ?? ''}`.toLowerCase();
    if (ABOUT_MARKERS.some((keyword) => marker.includes(keyword))) {
      addSection(sections, cleanText(element.textContent ?? ''));
    }
  }

  for (const heading of document.querySelectorAll('h1, h2, h3')) {
    if (sections.length >= MAX_ABOUT_SECTIONS) break;
    const headingText = cleanText(heading.textContent ?? '').toLowerCase();
    if (!ABOUT_PHRASES.some((phrase) => headingText === phrase || headingText.startsWith(`${phrase} `))) continue;

    const paragraphs: string[] = [];
    let sibling = heading.nextElementSibling;
    while (sibling && paragraphs.length < 3 && !/^H[1-3]$/.test(sibling.tagName)) {
      const text = cleanText(sibling.textContent ?? '');
      if (text) paragraphs.push(text);
      sibling = sibling.nextElementSibling;
    }
    addSection(sections, paragraphs.join(' '));
  }

  return sections;
}

function withoutCitations(text: string): string {
  return text.replace(/\[\d+\]/g, '');
}

/** "Key Information: Type: ...; Industry: ..." from the article infobox */
function wikipediaInfobox(document: ParsedDocument): string | null {
  const infobox = document.querySelector('table.infobox');
  if (!infobox) return null;

  const facts: string[] = [];
  for (const row of infobox.querySelectorAll('tr')) {
    const header = withoutCitations(cleanText(row.querySelector('th')?.textContent ?? ''));
    const value = withoutCitations(cleanText(row.querySelector('td')?.textContent ?? ''));
    if (!header || !value || value.length >= MAX_INFOBOX_VALUE_LENGTH) continue;

    const label = header.toLowerCase();
    if (INFOBOX_FIELDS.some((field) => label.includes(field))) {
      facts.push(`${header}: ${value}`);
    }
    if (facts.length >= MAX_INFOBOX_FIELDS) break;
  }
  return facts.length > 0 ? `Key Information: ${facts.join('; ')}` : null;
}

function wikipediaSections(document: ParsedDocument): string[] {
  const infobox = wikipediaInfobox(document);
  const lead = wikipediaLead(document);
  return infobox ? [infobox, ...lead] : lead;
}

function wikipediaLead(document: ParsedDocument): string[] {
  const paragraphs: string[] = [];
  for (const paragraph of document.querySelectorAll('.mw-parser-output p')) {
    const text = withoutCitations(cleanText(paragraph.textContent ?? ''));
    if (text.length >= MIN_SECTION_LENGTH) {
      paragraphs.push(text);
    }
    if (paragraphs.length >= 3) break;
  }
  return paragraphs.length > 0 ? [paragraphs.join(' ')] : [];
}

function findAboutLink(document: ParsedDocument, pageUrl: string): string | null {
  let base: URL;
  try {
    base = new URL(pageUrl);
  } catch {
    return null;
  }

  for (const anchor of document.querySelectorAll('a[href]')) {
    const href = anchor.getAttribute('href');
    if (!href || href.startsWith('#') || href.startsWith('mailto:')) continue;

    let target: URL;
    try {
      target = new URL(href, base);
    } catch {
      continue;
    }
    if (target.hostname !== base.hostname || target.pathname === base.pathname) continue;

    const linkText = cleanText(anchor.textContent ?? '').toLowerCase();
    const pathname = target.pathname.toLowerCase();
    if (ABOUT_MARKERS.some((marker) => pathname.includes(marker)) || ABOUT_PHRASES.includes(linkText)) {
      target.hash = '';
      return target.toString();
    }
  }
  return null;
}

function readableText(document: ParsedDocument): string {
  const article = new Readability(document).parse();
  if (article?.textContent) {
    return cleanText(article.textContent);
  }
  return cleanText(document.body?.textContent ?? '');
}

/**
 * Extract the descriptive parts of an HTML page
 */
export function extractPage(html: string, pageUrl: string): ExtractedPage {
  const { document } = parseHTML(html);

  const title = cleanText(document.querySelector('title')?.textContent ?? '');
  const description = metaContent(document);

  for (const element of document.querySelectorAll('script, style, noscript, template, svg')) {
    element.remove();
  }

  const aboutSections = isWikipedia(pageUrl) ? wikipediaSections(document) : findAboutSections(document);
  const aboutLink = findAboutLink(document, pageUrl);
  // Readability mutates the document, so it runs last
  const mainText = readableText(document);

  return { title, description, aboutSections, mainText, aboutLink };
}

export function combinePageText(page: ExtractedPage): string {
  const parts: string[] = [];
  for (const part of [page.title, page.description, ...page.aboutSections, page.mainText]) {
    if (part && !parts.includes(part)) {
      parts.push(part);
    }
  }
  return parts.join('\n\n');
}

export interface ContentFetcherOptions {
  followAboutLinks?: boolean;
}

export class ContentFetcher implements PageTextSource {
  private readonly followAboutLinks: boolean;

  constructor(
    private readonly http: HttpFetcher,
    options: ContentFetcherOptions = {}
  ) {
    this.followAboutLinks = options.followAboutLinks ?? true;
  }

  async fetch(url: string, organizationName: string): Promise<string> {
    const response = await this.http.getText(url);
    if (response.contentType && !/html|text\/plain|xml/i.test(response.contentType)) {
      throw new FetchError(`Unsupported content type ${response.contentType} at ${url}`, { url, status: response.status, retryable: false });
    }

    const page = extractPage(response.body, url);

    if (page.aboutSections.length === 0 && this.followAboutLinks && page.aboutLink) {
      page.aboutSections = await this.fetchAboutPage(page.aboutLink, organizationName);
    }

    return combinePageText(page);
  }

  private async fetchAboutPage(aboutUrl: string, organizationName: string): Promise<string[]> {
    try {
      const response = await this.http.getText(aboutUrl);
      const aboutPage = extractPage(response.body, aboutUrl);
      if (aboutPage.aboutSections.length > 0) {
        return aboutPage.aboutSections;
      }
      return aboutPage.mainText ? [aboutPage.mainText.slice(0, MAX_SECTION_LENGTH)] : [];
    } catch (error) {
      // The home page text is still usable
      logger.debug({ organization: organizationName, aboutUrl, error: errorMessage(error) }, 'About page fetch failed');
      return [];
    }
  }
}
