import * as cheerio from 'cheerio';
import type { AppConfig } from '../../shared/config';
import type { Article, ArticleImage, ArticleRef } from '../../shared/types';
import { parseSlashDate } from '../utils/dates';
import { LINE_BREAK, PARAGRAPH_BREAK, decodeEntities, normalizeWhitespace, textFromMarkedBreaks } from '../utils/text';
import { LIGHTBOX_MARKER, parseLightboxScript, promoteThumbnail, resolveSiteUrl } from './gallery';

export interface PageParser {
  /** Article links of one archive day, in page order. Never throws on missing markup. */
  parseListing: (html: string, forDate: string) => ArticleRef[];
  /** Structured article; fields the page does not carry stay null/empty. */
  parseDetail: (html: string, sourceUrl: string) => Article;
}

export interface PageParserOptions {
  site: Pick<AppConfig['site'], 'baseUrl' | 'articlePathPrefix'>;
  now?: () => Date;
}

const LISTING_CONTAINER = 'div.contenido';
const HEADER = 'div#areasuperiorColumna';
const BODY = 'div.cuerponota';
const STRIPPED_BODY_NODES = 'ins, script';
const BLOCK_ELEMENTS = 'p, div, h1, h2, h3, h4, h5, h6, li, ul, ol, blockquote, table, tr, figure, figcaption, section, article';

const ARTICLE_ID = /-(\d+)\.html$/;

export const extractArticleId = (url: string): string | null => ARTICLE_ID.exec(url)?.[1] ?? null;

const orNull = (value: string | null | undefined): string | null => (value ? value : null);

const cleanText = (value: string): string | null => orNull(normalizeWhitespace(decodeEntities(value)));

export const createPageParser = ({ site, now = () => new Date() }: PageParserOptions): PageParser => {
  const { baseUrl, articlePathPrefix } = site;

  const toSitePath = (href: string): string => (href.startsWith(baseUrl) ? href.slice(baseUrl.length) : href);

  const parseListing = (html: string, _forDate: string): ArticleRef[] => {
    const $ = cheerio.load(html);
    const container = $(LISTING_CONTAINER).first();
    if (!container.length) {
      return [];
    }
    const refs: ArticleRef[] = [];
    container.find('a[href]').each((_, el) => {
      const href = ($(el).attr('href') ?? '').trim();
      const sitePath = toSitePath(href);
      if (sitePath.startsWith(articlePathPrefix) && sitePath.endsWith('.html')) {
        refs.push({ url: `${baseUrl}${sitePath}`, position: refs.length + 1 });
      }
    });
    return refs;
  };

  const extractImages = ($: cheerio.CheerioAPI): ArticleImage[] => {
    const images: ArticleImage[] = [];
    $('script').each((_, el) => {
      const script = $(el).html() ?? '';
      if (script.includes(LIGHTBOX_MARKER)) {
        images.push(...parseLightboxScript(script, baseUrl));
      }
    });
    if (images.length) {
      return images;
    }
    const thumbnail = $('a#galerianotas img').first().attr('src');
    if (thumbnail) {
      images.push({ url: resolveSiteUrl(promoteThumbnail(thumbnail), baseUrl), caption: '' });
    }
    return images;
  };

  const extractKeywords = ($: cheerio.CheerioAPI): string[] => {
    const content = $('meta')
      .filter((_, el) => ($(el).attr('name') ?? '').toLowerCase() === 'keywords')
      .first()
      .attr('content');
    if (!content) {
      return [];
    }
    return content
      .split(',')
      .map((keyword) => keyword.trim())
      .filter(Boolean);
  };

  const parseDetail = (html: string, sourceUrl: string): Article => {
    const $ = cheerio.load(html);

    let title: string | null = null;
    let subtitle: string | null = null;
    let section: string | null = null;
    let source: string | null = null;
    let location: string | null = null;
    let date: string | null = null;

    const header = $(HEADER).first();
    if (header.length) {
      const sectionText = header.find('p#seccion').first().text();
      section = cleanText(sectionText.replace(/^\s*Secci[oó]n:\s*/i, ''));
      title = cleanText(header.find('h1').first().text());
      subtitle = cleanText(header.find('h2').first().text());

      const h3 = header.find('h3').first();
      if (h3.length) {
        const place = h3.find('span#lugar').first();
        if (place.length) {
          location = cleanText(place.text());
          date = location ? parseSlashDate(location) : null;
        }
        const byline = h3.clone();
        byline.find('span#lugar').remove();
        source = cleanText(byline.text());
      }
    }

    let body: string | null = null;
    let bodyHtml: string | null = null;
    const bodyNode = $(BODY).first();
    if (bodyNode.length) {
      bodyNode.find(STRIPPED_BODY_NODES).remove();
      bodyHtml = $.html(bodyNode);
      // Text is read from the parsed tree; breaks go in as markers on a copy.
      const flat = bodyNode.clone();
      flat.find('style').remove();
      flat.find('br').replaceWith(LINE_BREAK);
      flat.find(BLOCK_ELEMENTS).after(PARAGRAPH_BREAK);
      body = orNull(textFromMarkedBreaks(flat.text()));
    }

    return {
      articleId: extractArticleId(sourceUrl),
      url: sourceUrl,
      title,
      subtitle,
      section,
      source,
      location,
      date,
      body,
      bodyHtml,
      images: extractImages($),
      keywords: extractKeywords($),
      scrapedAt: now().toISOString(),
    };
  };

  return { parseListing, parseDetail };
};
