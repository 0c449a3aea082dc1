import { describe, it, expect } from 'vitest';
import { AffiliateScanner, emptyScanResult, truncateUrl } from '../lib/scanner';
import { AFFILIATE_NETWORKS, matchNetwork } from '../lib/scanner/patterns';
import { testContext } from './helpers';

describe('Affiliate Pattern Matching', () => {
  describe('AFFILIATE_NETWORKS', () => {
    it('should list networks in precedence order', () => {
      expect(AFFILIATE_NETWORKS.map(rule => rule.networkId)).toEqual([
        'amazon',
        'shareasale',
        'cj_affiliate',
        'ebay',
        'clickbank',
      ]);
    });

    it('should compile every pattern case-insensitively', () => {
      for (const rule of AFFILIATE_NETWORKS) {
        expect(rule.patterns.length).toBeGreaterThan(0);
        expect(rule.patterns.every(pattern => pattern.flags.includes('i'))).toBe(true);
      }
    });
  });

  describe('matchNetwork', () => {
    it('should detect Amazon tag links and short links', () => {
      expect(matchNetwork('https://www.amazon.com/dp/B08N5WRWNW?tag=demo-20&psc=1')?.networkId).toBe('amazon');
      expect(matchNetwork('https://www.amazon.co.uk/gp/product/B0TEST/ref=as_li?ie=UTF8&tag=demo-21')?.networkId).toBe('amazon');
      expect(matchNetwork('HTTPS://AMZN.TO/3abc123')?.networkId).toBe('amazon');
    });

    it('should detect ShareASale links', () => {
      expect(matchNetwork('https://www.shareasale.com/r.cfm?m=12345&u=567')?.displayName).toBe('ShareASale');
      expect(matchNetwork('https://shareasale.com/process-order?affiliate=789')?.displayName).toBe('ShareASale');
    });

    it('should detect CJ Affiliate click domains', () => {
      expect(matchNetwork('https://www.anrdoezrs.net/click-12345')?.displayName).toBe('CJ Affiliate');
      expect(matchNetwork('https://dpbolvw.net/image-12345.jpg')?.displayName).toBe('CJ Affiliate');
    });

    it('should detect eBay Partner Network tracking parameters', () => {
      expect(matchNetwork('https://www.ebay.com/itm/12345?_trksid=p2349624.m4')?.displayName).toBe('eBay Partner Network');
      expect(matchNetwork('https://ebay.com/itm/12345?mkcid=1&campid=5338')?.displayName).toBe('eBay Partner Network');
    });

    it('should detect ClickBank hop links', () => {
      expect(matchNetwork('https://vendor.hop.clickbank.net/?affiliate=demo')?.displayName).toBe('ClickBank');
      expect(matchNetwork('https://hop.clickbank.net/?affiliate=demo&vendor=test')?.displayName).toBe('ClickBank');
    });

    it('should return null for ordinary links', () => {
      expect(matchNetwork('https://example.com/product?tag=123')).toBeNull();
      expect(matchNetwork('https://www.amazon.com/gp/help/customer/display.html')).toBeNull();
      expect(matchNetwork('https://google.com/search?q=test')).toBeNull();
    });

    it('should attribute a URL matching several networks to the first one only', () => {
      const url = 'https://www.amazon.com/dp/B0TEST?tag=demo-20&u=https://shareasale.com/r.cfm?m=123';
      const shareASale = AFFILIATE_NETWORKS[1];

      expect(shareASale.patterns.some(pattern => pattern.test(url))).toBe(true);
      expect(matchNetwork(url)).toEqual({
        networkId: 'amazon',
        displayName: 'Amazon Associates',
        matchedUrl: url,
      });
    });
  });
});

describe('AffiliateScanner', () => {
  const { context } = testContext();
  const scanner = new AffiliateScanner(context);

  it('should detect a single Amazon short link', () => {
    const result = scanner.detect('<p>Buy it <a href="https://amzn.to/3xyz123">here</a></p>');

    expect(result.found).toBe(true);
    expect(result.networks).toEqual(['Amazon Associates']);
    expect(result.totalMatches).toBe(1);
    expect(result.uniqueUrls).toBe(1);
    expect(result.sampleUrls).toEqual(['https://amzn.to/3xyz123']);
    expect(result.diagnostic).toBeUndefined();
  });

  it('should detect a link whose href is unquoted', () => {
    const result = scanner.detect('<a href=https://amzn.to/3xyz123>buy</a>');

    expect(result.found).toBe(true);
    expect(result.totalMatches).toBe(1);
    expect(result.sampleUrls).toEqual(['https://amzn.to/3xyz123']);
  });

  it('should not count lazy-load data attributes as links', () => {
    const result = scanner.detect('<img data-src="https://amzn.to/lazy1" src="https://example.com/blank.gif">');

    expect(result).toEqual(emptyScanResult());
  });

  it('should return the canonical empty result for empty or non-string input', () => {
    expect(scanner.detect('')).toEqual(emptyScanResult());
    expect(scanner.detect('   \n\t ')).toEqual(emptyScanResult());
    expect(scanner.detect(null)).toEqual(emptyScanResult());
    expect(scanner.detect(42)).toEqual(emptyScanResult());
    expect(scanner.detect('').found).toBe(false);
  });

  it('should return no matches for clean markup', () => {
    const result = scanner.detect(`
      <a href="https://example.com/page1">Regular Link 1</a>
      <a href="https://google.com/search?q=test">Regular Link 2</a>
    `);

    expect(result).toEqual(emptyScanResult());
  });

  it('should count every occurrence but report one unique URL', () => {
    const html = `
      <a href="https://www.amazon.com/dp/B0TEST?tag=demo-20&amp;psc=1">one</a>
      <a href="https://www.amazon.com/dp/B0TEST?tag=demo-20&#38;psc=1">two</a>
      <a href=" https://www.amazon.com/dp/B0TEST?tag=demo-20&psc=1 ">three</a>
    `;
    const result = scanner.detect(html);

    expect(result.totalMatches).toBe(3);
    expect(result.uniqueUrls).toBe(1);
    expect(result.sampleUrls).toEqual(['https://www.amazon.com/dp/B0TEST?tag=demo-20&psc=1']);
  });

  it('should collapse byte-identical attribute values before classification', () => {
    const html = '<a href="https://amzn.to/dup1">a</a><a href="https://amzn.to/dup1">b</a>';

    expect(scanner.detect(html).totalMatches).toBe(1);
  });

  it('should find links in href, src, action and meta refresh', () => {
    const html = `
      <meta http-equiv="refresh" content="0; url=https://amzn.to/refresh1">
      <a href="https://www.amazon.com/dp/B08N5WRWNW?tag=affiliate123-20&amp;psc=1">Amazon</a>
      <a href="https://www.shareasale.com/r.cfm?m=12345&amp;u=567">ShareASale</a>
      <img src="https://dpbolvw.net/image-12345.jpg">
      <a href="https://www.ebay.com/itm/12345?_trksid=p2349624.m4">eBay</a>
      <a href="https://vendor.hop.clickbank.net/?affiliate=demo">ClickBank</a>
      <form action="https://shareasale.com/process-order?affiliate=789"></form>
      <a href="https://example.com/regular-link">Regular</a>
    `;
    const result = scanner.detect(html);

    expect(result.found).toBe(true);
    expect(result.totalMatches).toBe(7);
    expect(result.uniqueUrls).toBe(7);
    expect(result.networks).toEqual([
      'Amazon Associates',
      'ShareASale',
      'CJ Affiliate',
      'eBay Partner Network',
      'ClickBank',
    ]);
    expect(result.allMatches.map(match => match.networkId)).toEqual([
      'amazon',
      'amazon',
      'shareasale',
      'cj_affiliate',
      'ebay',
      'clickbank',
      'shareasale',
    ]);
    expect(result.sampleUrls).toEqual([
      'https://amzn.to/refresh1',
      'https://www.amazon.com/dp/B08N5WRWNW?tag=affiliate123-20&psc=1',
      'https://www.shareasale.com/r.cfm?m=12345&u=567',
      'https://dpbolvw.net/image-12345.jpg',
      'https://www.ebay.com/itm/12345?_trksid=p2349624.m4',
    ]);
  });

  it('should cap samples at five and truncate long URLs', () => {
    const urls = Array.from(
      { length: 7 },
      (_, i) => `https://www.amazon.com/${'long-product-name-'.repeat(7)}/dp/B0ITEM${i}?tag=demo-20`
    );
    const html = urls.map(url => `<a href="${url}">item</a>`).join('\n');
    const result = scanner.detect(html);

    expect(result.totalMatches).toBe(7);
    expect(result.uniqueUrls).toBe(7);
    expect(result.found).toBe(result.totalMatches > 0);
    expect(result.sampleUrls).toHaveLength(5);
    for (const sample of result.sampleUrls) {
      expect(sample).toHaveLength(103);
      expect(sample.endsWith('...')).toBe(true);
    }
    expect(result.sampleUrls[0]).toBe(`${urls[0].slice(0, 100)}...`);
  });
});

describe('truncateUrl', () => {
  it('should leave URLs of 100 characters or fewer untouched', () => {
    const exact = `https://amzn.to/${'a'.repeat(84)}`;
    expect(exact).toHaveLength(100);
    expect(truncateUrl(exact)).toBe(exact);
    expect(truncateUrl(`${exact}b`)).toBe(`${exact}...`);
  });
});
