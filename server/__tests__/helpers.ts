import { vi } from 'vitest';
import { buildConfig } from '../config/config';
import type { AppConfig } from '../../shared/config';
import type { BackfillProgress } from '../../shared/types';
import type { Logger } from '../obs/logger';
import type { ArticleSink } from '../persistence/types';
import type { FetchResponse } from '../retrieval/fetcher';

export const BASE_URL = 'https://www.alcalorpolitico.com';

export const testConfig = (env: Record<string, string> = {}): AppConfig =>
  buildConfig({ LOG_LEVEL: 'error', LOG_TO_FILE: 'false', OUTPUT_DIR: '/tmp/daily-archive-scraper-test', ...env });

export const createTestLogger = (): Logger & { [K in keyof Logger]: ReturnType<typeof vi.fn> } => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

/** Single-byte encoding of `text`, one byte per UTF-16 unit. */
export const latin1Bytes = (text: string): ArrayBuffer => {
  const buffer = new ArrayBuffer(text.length);
  const view = new Uint8Array(buffer);
  for (let i = 0; i < text.length; i += 1) {
    view[i] = text.charCodeAt(i) & 0xff;
  }
  return buffer;
};

export const htmlResponse = (text: string, status = 200, statusText = 'OK'): FetchResponse => ({
  ok: status >= 200 && status < 300,
  status,
  statusText,
  arrayBuffer: async () => latin1Bytes(text),
});

export const listingHtml = (paths: string[]): string => `
  <html><body>
    <div class="menu"><a href="/informacion/menu-1.html">Menu</a></div>
    <div class="contenido">
      ${paths.map((path) => `<a href="${path}">Nota</a>`).join('\n      ')}
    </div>
  </body></html>
`;

export const detailHtml = ({ title, date = '15/12/2024' }: { title: string; date?: string }): string => `
  <html>
    <head><meta name="Keywords" content="Xalapa, politica, , elecciones"></head>
    <body>
      <div id="areasuperiorColumna">
        <p id="seccion">Sección: Estado de Veracruz</p>
        <h1>${title}</h1>
        <h2>El Congreso voto por mayoria</h2>
        <h3>Redaccion <span id="lugar">Xalapa, Ver. ${date}</span></h3>
      </div>
      <div class="cuerponota"><p>Primer parrafo.</p><ins>anuncio</ins><script>var x = 1;</script><p>Segundo&nbsp;parrafo.</p><p> </p><p>Tercero</p></div>
      <script>$.iLightBox([{URL: "/fotos/originales/a.jpg", caption: "Foto &amp; uno"},{URL: "https://cdn.example.org/b.jpg", caption: ""}], {skin: 'dark'});</script>
    </body>
  </html>
`;

/** In-memory sink that records calls and keeps one checkpoint per source. */
export const createMemorySink = () => {
  const checkpoints = new Map<string, BackfillProgress>();
  const sink = {
    checkpoints,
    upsertArticle: vi.fn<ArticleSink['upsertArticle']>(async () => 'inserted'),
    bulkUpsertArticles: vi.fn<ArticleSink['bulkUpsertArticles']>(async (articles) => ({
      total: articles.length,
      inserted: articles.length,
      updated: 0,
      errors: [],
    })),
    recordScrapeRun: vi.fn<ArticleSink['recordScrapeRun']>(async () => 'run-1'),
    getBackfillProgress: vi.fn<ArticleSink['getBackfillProgress']>(async (source) => checkpoints.get(source) ?? null),
    updateBackfillProgress: vi.fn<ArticleSink['updateBackfillProgress']>(async (progress) => {
      checkpoints.set(progress.source, { ...progress });
    }),
    healthCheck: vi.fn<ArticleSink['healthCheck']>(async () => true),
    countArticles: vi.fn<ArticleSink['countArticles']>(async () => 0),
    applySchema: vi.fn<ArticleSink['applySchema']>(async () => {}),
    close: vi.fn<ArticleSink['close']>(async () => {}),
  };
  return sink satisfies ArticleSink;
};
