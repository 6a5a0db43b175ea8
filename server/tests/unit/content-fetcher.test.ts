import { describe, it, expect } from 'vitest';
import { ContentFetcher, combinePageText, extractPage } from '../../src/services/content-fetcher.js';
import { FetchError } from '../../src/errors.js';
import type { HttpFetcher, TextResponse } from '../../src/services/http-client.js';

class PageMapHttp implements HttpFetcher {
  requested: string[] = [];

  constructor(private readonly pages: Record<string, { body: string; contentType?: string } | Error>) {}

  async getText(url: string): Promise<TextResponse> {
    this.requested.push(url);
    const page = this.pages[url];
    if (page === undefined) {
      throw new FetchError(`HTTP 404 for ${url}`, { url, status: 404, retryable: false });
    }
    if (page instanceof Error) {
      throw page;
    }
    return { url, status: 200, contentType: page.contentType ?? 'text/html; charset=utf-8', body: page.body };
  }

  async getJson(): Promise<unknown> {
    return {};
  }
}

const HOME_WITH_SECTION = `<!doctype html>
<html><head>
  <title>Helvetia Group</title>
  <meta name="description" content="  Swiss insurance   group. ">
</head><body>
  <nav><a href="/en/about-us">About us</a></nav>
  <section id="about-helvetia"><p>Helvetia is an insurance group providing life and non-life cover across Europe.</p></section>
  <script>window.tracking = true;</script>
</body></html>`;

describe('extractPage', () => {
  it('reads title, meta description, about sections and the about link', () => {
    const page = extractPage(HOME_WITH_SECTION, 'https://www.helvetia.example/');

    expect(page.title).toBe('Helvetia Group');
    expect(page.description).toBe('Swiss insurance group.');
    expect(page.aboutSections).toEqual([
      'Helvetia is an insurance group providing life and non-life cover across Europe.',
    ]);
    expect(page.aboutLink).toBe('https://www.helvetia.example/en/about-us');
  });

  it('collects paragraphs under an about heading', () => {
    const html = `<html><body>
      <h2>Who we are</h2>
      <p>We are a mutual insurer owned by our policyholders since 1890.</p>
      <p>We serve farmers.</p>
      <h2>News</h2>
      <p>Quarterly results are out.</p>
    </body></html>`;

    expect(extractPage(html, 'https://mutual.example/').aboutSections).toEqual([
      'We are a mutual insurer owned by our policyholders since 1890. We serve farmers.',
    ]);
  });

  it('uses the lead paragraphs on Wikipedia', () => {
    const html = `<html><body><div class="mw-parser-output">
      <p>Short.</p>
      <p>Mapfre is a Spanish multinational insurance company headquartered in Majadahonda.[1]</p>
    </div></body></html>`;

    expect(extractPage(html, 'https://en.wikipedia.org/wiki/Mapfre').aboutSections).toEqual([
      'Mapfre is a Spanish multinational insurance company headquartered in Majadahonda.',
    ]);
  });

  it('puts Wikipedia infobox facts ahead of the lead', () => {
    const html = `<html><body><div class="mw-parser-output">
      <table class="infobox vcard"><tbody>
        <tr><th colspan="2">Mapfre S.A.</th></tr>
        <tr><th>Type</th><td>Sociedad Anónima</td></tr>
        <tr><th>Industry</th><td>Insurance[2]</td></tr>
        <tr><th>Services</th><td>${'x'.repeat(200)}</td></tr>
        <tr><th>Founded</th><td>1933</td></tr>
        <tr><th>Key people</th><td>A. Chair (Chairman)</td></tr>
        <tr><th>Products</th><td>Life insurance, Reinsurance</td></tr>
        <tr><th>Revenue</th><td>€28.9 billion</td></tr>
        <tr><th>Number of employees</th><td>31,000</td></tr>
      </tbody></table>
      <p>Mapfre is a Spanish multinational insurance company headquartered in Majadahonda.[1]</p>
    </div></body></html>`;

    expect(extractPage(html, 'https://en.wikipedia.org/wiki/Mapfre').aboutSections).toEqual([
      'Key Information: Type: Sociedad Anónima; Industry: Insurance; Founded: 1933; Products: Life insurance, Reinsurance; Revenue: €28.9 billion',
      'Mapfre is a Spanish multinational insurance company headquartered in Majadahonda.',
    ]);
  });

  it('ignores infobox tables outside Wikipedia', () => {
    const html = `<html><body><table class="infobox"><tr><th>Industry</th><td>Insurance</td></tr></table></body></html>`;
    expect(extractPage(html, 'https://acme.example/').aboutSections).toEqual([]);
  });

  it('ignores about links to other hosts', () => {
    const html = '<html><body><a href="https://elsewhere.example/about">About</a></body></html>';
    expect(extractPage(html, 'https://acme.example/').aboutLink).toBeNull();
  });
});

describe('combinePageText', () => {
  it('joins distinct non-empty parts in order', () => {
    expect(
      combinePageText({
        title: 'Acme',
        description: '',
        aboutSections: ['Acme insures boats.', 'Acme'],
        mainText: 'Acme insures boats.',
        aboutLink: null,
      })
    ).toBe('Acme\n\nAcme insures boats.');
  });
});

describe('ContentFetcher', () => {
  it('does not follow the about link when the home page has an about section', async () => {
    const http = new PageMapHttp({ 'https://www.helvetia.example/': { body: HOME_WITH_SECTION } });
    const text = await new ContentFetcher(http).fetch('https://www.helvetia.example/', 'Helvetia');

    expect(http.requested).toEqual(['https://www.helvetia.example/']);
    expect(text.startsWith('Helvetia Group\n\nSwiss insurance group.\n\nHelvetia is an insurance group')).toBe(true);
  });

  it('follows a same-site about link when the home page has no about section', async () => {
    const http = new PageMapHttp({
      'https://acme.example/': { body: '<html><head><title>Acme Mutual</title></head><body><p>Welcome</p><a href="/company/about">Company</a></body></html>' },
      'https://acme.example/company/about': {
        body: '<html><body><div class="about-block">Acme Mutual is a cooperative insurer for small businesses in Ohio.</div></body></html>',
      },
    });

    const text = await new ContentFetcher(http).fetch('https://acme.example/', 'Acme Mutual');

    expect(http.requested).toEqual(['https://acme.example/', 'https://acme.example/company/about']);
    expect(text.split('\n\n').slice(0, 2)).toEqual([
      'Acme Mutual',
      'Acme Mutual is a cooperative insurer for small businesses in Ohio.',
    ]);
  });

  it('keeps the home page text when the about page fails', async () => {
    const http = new PageMapHttp({
      'https://acme.example/': { body: '<html><head><title>Acme Mutual</title></head><body><a href="/about">About</a></body></html>' },
    });

    const text = await new ContentFetcher(http).fetch('https://acme.example/', 'Acme Mutual');
    expect(text.split('\n\n')[0]).toBe('Acme Mutual');
    expect(http.requested).toEqual(['https://acme.example/', 'https://acme.example/about']);
  });

  it('does not follow links when disabled', async () => {
    const http = new PageMapHttp({
      'https://acme.example/': { body: '<html><head><title>Acme</title></head><body><a href="/about">About</a></body></html>' },
    });
    await new ContentFetcher(http, { followAboutLinks: false }).fetch('https://acme.example/', 'Acme');
    expect(http.requested).toEqual(['https://acme.example/']);
  });

  it('rejects non-HTML documents without retry', async () => {
    const http = new PageMapHttp({
      'https://acme.example/report': { body: '%PDF-1.7', contentType: 'application/pdf' },
    });

    const error = await new ContentFetcher(http).fetch('https://acme.example/report', 'Acme').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(FetchError);
    if (error instanceof FetchError) {
      expect(error.retryable).toBe(false);
      expect(error.message).toBe('Unsupported content type application/pdf at https://acme.example/report');
    }
  });
});
