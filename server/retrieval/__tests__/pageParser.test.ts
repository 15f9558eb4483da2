import { describe, expect, it } from 'vitest';
import { BASE_URL, detailHtml, listingHtml } from '../../__tests__/helpers';
import { createPageParser, extractArticleId } from '../pageParser';

const parser = createPageParser({
  site: { baseUrl: BASE_URL, articlePathPrefix: '/informacion/' },
  now: () => new Date('2024-12-16T08:00:00.000Z'),
});

const ARTICLE_URL = `${BASE_URL}/informacion/aprueban-presupuesto-401234.html`;

describe('parseListing', () => {
  it('keeps only article links inside the listing container', () => {
    const html = listingHtml([
      '/informacion/nota-uno-1001.html',
      '/informacion/notasarchivo.php?fn=2024-12-15',
      `${BASE_URL}/informacion/nota-dos-1002.html`,
      '/deportes/nota-tres-1003.html',
      '/informacion/nota-cuatro-1004.html',
    ]);

    expect(parser.parseListing(html, '2024-12-15')).toEqual([
      { url: `${BASE_URL}/informacion/nota-uno-1001.html`, position: 1 },
      { url: `${BASE_URL}/informacion/nota-dos-1002.html`, position: 2 },
      { url: `${BASE_URL}/informacion/nota-cuatro-1004.html`, position: 3 },
    ]);
  });

  it('returns an empty list when the container is missing', () => {
    const html = '<html><body><a href="/informacion/nota-1.html">x</a></body></html>';
    expect(parser.parseListing(html, '2024-12-15')).toEqual([]);
  });
});

describe('parseDetail', () => {
  it('extracts header, body, gallery and keywords', () => {
    const article = parser.parseDetail(detailHtml({ title: 'Aprueban presupuesto &amp; reformas' }), ARTICLE_URL);

    expect(article.articleId).toBe('401234');
    expect(article.url).toBe(ARTICLE_URL);
    expect(article.section).toBe('Estado de Veracruz');
    expect(article.title).toBe('Aprueban presupuesto & reformas');
    expect(article.subtitle).toBe('El Congreso voto por mayoria');
    expect(article.location).toBe('Xalapa, Ver. 15/12/2024');
    expect(article.date).toBe('2024-12-15');
    expect(article.source).toBe('Redaccion');
    expect(article.body).toBe('Primer parrafo.\n\nSegundo parrafo.\n\nTercero');
    expect(article.bodyHtml?.startsWith('<div class="cuerponota">')).toBe(true);
    expect(article.bodyHtml).not.toContain('anuncio');
    expect(article.images).toEqual([
      { url: `${BASE_URL}/fotos/originales/a.jpg`, caption: 'Foto & uno' },
      { url: 'https://cdn.example.org/b.jpg', caption: '' },
    ]);
    expect(article.keywords).toEqual(['Xalapa', 'politica', 'elecciones']);
    expect(article.scrapedAt).toBe('2024-12-16T08:00:00.000Z');
  });

  it('leaves missing fields null and lists empty', () => {
    const article = parser.parseDetail('<html><body><p>Sin estructura</p></body></html>', `${BASE_URL}/informacion/sin-id.html`);

    expect(article).toMatchObject({
      articleId: null,
      title: null,
      subtitle: null,
      section: null,
      source: null,
      location: null,
      date: null,
      body: null,
      bodyHtml: null,
      images: [],
      keywords: [],
    });
  });

  it('leaves the date null when the location carries none', () => {
    const html = `
      <div id="areasuperiorColumna"><h1>Titulo</h1><h3>AVC <span id="lugar">Xalapa, Ver.</span></h3></div>
    `;
    const article = parser.parseDetail(html, ARTICLE_URL);

    expect(article.location).toBe('Xalapa, Ver.');
    expect(article.date).toBeNull();
    expect(article.source).toBe('AVC');
  });

  it('falls back to the gallery thumbnail at full resolution', () => {
    const html = `
      <div class="cuerponota"><p>Texto</p></div>
      <a id="galerianotas" href="#"><img src="/fotos/previas/portada.jpg"></a>
    `;
    const article = parser.parseDetail(html, ARTICLE_URL);

    expect(article.images).toEqual([{ url: `${BASE_URL}/fotos/originales/portada.jpg`, caption: '' }]);
  });
});

describe('extractArticleId', () => {
  it('reads the trailing digits of the article path', () => {
    expect(extractArticleId(`${BASE_URL}/informacion/nota-98765.html`)).toBe('98765');
    expect(extractArticleId(`${BASE_URL}/informacion/nota.html`)).toBeNull();
  });
});

describe('parseDetail body text', () => {
  const bodyOf = (inner: string) =>
    parser.parseDetail(`<html><body><div class="cuerponota">${inner}</div></body></html>`, ARTICLE_URL).body;

  it('ignores markup inside attribute values', () => {
    expect(bodyOf('<p>Uno <img src="/a.jpg" alt="x > y"> dos.</p><p>Tres</p>')).toBe('Uno dos.\n\nTres');
  });

  it('breaks lines at <br> and keeps nested blocks apart', () => {
    expect(bodyOf('<div><p>Uno<br>dos</p>\n<p>  Tres  </p></div><style>p { color: red }</style>')).toBe(
      'Uno\ndos\n\nTres',
    );
  });

  it('keeps decoded entities as text', () => {
    expect(bodyOf('<p>5 &lt; 7 &amp;&amp; Pol&iacute;tica</p>')).toBe('5 < 7 && Política');
  });
});
