// Sources module - describes the listing page papers are discovered from

import type { Config } from './config';

export interface ListingSource {
  name: string;
  indexUrl: string;
  entrySelector: string; // one match per paper: the anchor inside its heading
  pathSegment: string; // leading path of each entry's href, swapped for pdfBaseUrl
  pdfBaseUrl: string;
}

export const TRENDING_PAPERS: ListingSource = {
  name: 'Hugging Face Daily Papers',
  indexUrl: 'https://huggingface.co/papers',
  entrySelector: 'h3 a',
  pathSegment: '/papers',
  pdfBaseUrl: 'https://arxiv.org/pdf',
};

export function listingSourceFromConfig(config: Pick<Config, 'listingUrl' | 'pdfBaseUrl'>): ListingSource {
  return {
    ...TRENDING_PAPERS,
    indexUrl: config.listingUrl,
    pdfBaseUrl: config.pdfBaseUrl,
  };
}
