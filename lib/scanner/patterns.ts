import { AffiliateMatch, NetworkRule } from './types';

const AMAZON_TLDS = '(?:com|co\\.uk|ca|de|fr|it|es|co\\.jp|cn|in|com\\.au|com\\.br|com\\.mx)';

const CJ_CLICK_DOMAINS = [
  'anrdoezrs.net',
  'dpbolvw.net',
  'tkqlhce.com',
  'jdoqocy.com',
  'kqzyfj.com',
  'qksrv.net',
  'awltovhc.com',
  'vwcjb.net',
];

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// Order matters: a URL is attributed to the first network with a matching pattern.
export const AFFILIATE_NETWORKS: readonly NetworkRule[] = Object.freeze([
  {
    networkId: 'amazon',
    displayName: 'Amazon Associates',
    patterns: [
      new RegExp(`https?://(?:www\\.)?amazon\\.${AMAZON_TLDS}/[^"']*[?&](?:tag|associate-tag)=[a-zA-Z0-9_-]+`, 'i'),
      new RegExp(`https?://(?:www\\.)?amazon\\.${AMAZON_TLDS}/gp/product/[^"']*/ref=[^"']*\\?[^"']*tag=[a-zA-Z0-9_-]+`, 'i'),
      new RegExp(`https?://(?:www\\.)?amazon\\.${AMAZON_TLDS}/[^"']*/dp/[^"']*/ref=[^"']*\\?[^"']*tag=[a-zA-Z0-9_-]+`, 'i'),
      /https?:\/\/amzn\.to\/[a-zA-Z0-9]+/i,
      new RegExp(`https?://smile\\.amazon\\.${AMAZON_TLDS}/[^"']*[?&]tag=[a-zA-Z0-9_-]+`, 'i'),
    ],
  },
  {
    networkId: 'shareasale',
    displayName: 'ShareASale',
    patterns: [
      /https?:\/\/(?:www\.)?shareasale\.com\/[^"']*[?&]r=[0-9]+/i,
      /https?:\/\/(?:www\.)?shareasale\.com\/r\.cfm\?[^"']*(?:merchantID|m)=[0-9]+/i,
      /https?:\/\/(?:www\.)?shareasale\.com\/[^"']*\?(?:[^"']*&)*[a-zA-Z]+=[0-9]+/i,
      /https?:\/\/(?:www\.)?shareasale\.com\/[^"']*[?&]affiliate=[0-9]+/i,
    ],
  },
  {
    networkId: 'cj_affiliate',
    displayName: 'CJ Affiliate',
    patterns: CJ_CLICK_DOMAINS.map(
      (domain) => new RegExp(`https?://(?:www\\.)?${escapeRegExp(domain)}/[\\w/.-]+`, 'i')
    ),
  },
  {
    networkId: 'ebay',
    displayName: 'eBay Partner Network',
    patterns: [
      /https?:\/\/(?:www\.)?ebay\.com\/[^"']*[?&]_trksid=[a-zA-Z0-9_-]+/i,
      /https?:\/\/(?:www\.)?ebay\.com\/[^"']*[?&]mkcid=[0-9]+/i,
      /https?:\/\/(?:www\.)?ebay\.com\/[^"']*[?&]campid=[0-9]+/i,
    ],
  },
  {
    networkId: 'clickbank',
    displayName: 'ClickBank',
    patterns: [
      /https?:\/\/(?:[a-zA-Z0-9-]+\.)?clickbank\.net\/[^"']*/i,
      /https?:\/\/(?:hop|redirect)\.clickbank\.net\/\?[^"']*/i,
      /https?:\/\/[^"']*\.hop\.clickbank\.net[^"']*/i,
    ],
  },
] satisfies NetworkRule[]);

export function matchNetwork(url: string): AffiliateMatch | null {
  for (const rule of AFFILIATE_NETWORKS) {
    if (rule.patterns.some(pattern => pattern.test(url))) {
      return {
        networkId: rule.networkId,
        displayName: rule.displayName,
        matchedUrl: url,
      };
    }
  }
  return null;
}
