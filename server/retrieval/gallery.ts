import type { ArticleImage } from '../../shared/types';
import { decodeEntities } from '../utils/text';

/**
 * Reads the image list out of the lightbox bootstrap script that detail
 * pages embed:
 *
 *   $.iLightBox([ { URL: "/path/a.jpg", caption: "..." }, ... ]);
 *
 * Only this literal shape is recognised. Entries whose caption is missing or
 * that use another key order are skipped.
 */
export const LIGHTBOX_MARKER = '$.iLightBox';

const LIGHTBOX_ARRAY = /\$\.iLightBox\(\s*\[([^\]]+)\]/;
const LIGHTBOX_ENTRY = /\{\s*URL:\s*"([^"]+)"\s*,\s*caption:\s*"([^"]*)"\s*\}/g;

export const resolveSiteUrl = (value: string, baseUrl: string): string => {
  if (/^https?:\/\//i.test(value)) {
    return value;
  }
  return `${baseUrl}${value.startsWith('/') ? '' : '/'}${value}`;
};

export const parseLightboxScript = (script: string, baseUrl: string): ArticleImage[] => {
  if (!script.includes(LIGHTBOX_MARKER)) {
    return [];
  }
  const array = LIGHTBOX_ARRAY.exec(script);
  if (!array) {
    return [];
  }
  const images: ArticleImage[] = [];
  for (const entry of array[1].matchAll(LIGHTBOX_ENTRY)) {
    images.push({
      url: resolveSiteUrl(entry[1], baseUrl),
      caption: decodeEntities(entry[2]).trim(),
    });
  }
  return images;
};

/** Thumbnail path → full-resolution path. */
export const promoteThumbnail = (src: string): string => src.replace('/previas/', '/originales/');
