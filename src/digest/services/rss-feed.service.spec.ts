import { loadDigestConfig } from '../config/digest.config';
import { DigestStorageService } from './digest-storage.service';
import { RssFeedService } from './rss-feed.service';

const RSS = `<?xml version="1.0"?>
<rss version="2.0"><channel>
  <title>Example News</title>
  <item>
    <title><![CDATA[AI &amp; Media: first]]></title>
    <link>https://example.com/news/1</link>
    <description>&lt;p&gt;Short summary&lt;/p&gt;</description>
    <content:encoded><![CDATA[<p>Full body</p>]]></content:encoded>
    <pubDate>Mon, 19 Oct 2026 08:00:00 GMT</pubDate>
  </item>
  <item>
    <title>Second story</title>
    <link>https://example.com/news/2</link>
    <dc:date>2026-10-18T22:00:00Z</dc:date>
  </item>
</channel></rss>`;

const ATOM = `<feed xmlns="http://www.w3.org/2005/Atom">
  <title type="text">Atom Source</title>
  <entry>
    <title>Atom story</title>
    <link rel="self" href="https://example.com/self"/>
    <link rel="alternate" href="https://example.com/atom?a=1&amp;b=2"/>
    <summary>Atom summary</summary>
    <updated>2026-10-19T01:02:03Z</updated>
  </entry>
</feed>`;

describe('RssFeedService', () => {
  let service: RssFeedService;
  let storage: DigestStorageService;
  let healthSpy: jest.SpyInstance;

  beforeEach(() => {
    const config = loadDigestConfig({ DATA_DIR: '/tmp/digest-test' });
    storage = new DigestStorageService(config);
    healthSpy = jest
      .spyOn(storage, 'appendFeedHealth')
      .mockResolvedValue(undefined);
    service = new RssFeedService(config, storage);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('parses rss items with channel title, entities and dates', () => {
    const feed = service.parseFeed(RSS);

    expect(feed.title).toBe('Example News');
    expect(feed.entries).toHaveLength(2);
    expect(feed.entries[0]).toEqual({
      title: 'AI & Media: first',
      link: 'https://example.com/news/1',
      summary: '<p>Short summary</p>',
      description: '<p>Short summary</p>',
      content: [{ value: '<p>Full body</p>' }],
      published: 'Mon, 19 Oct 2026 08:00:00 GMT',
      published_parsed: [2026, 10, 19, 8, 0, 0],
    });
    expect(feed.entries[1]?.published_parsed).toEqual([
      2026, 10, 18, 22, 0, 0,
    ]);
  });

  it('parses atom entries preferring the alternate link', () => {
    const feed = service.parseFeed(ATOM);

    expect(feed.title).toBe('Atom Source');
    expect(feed.entries[0]).toEqual({
      title: 'Atom story',
      link: 'https://example.com/atom?a=1&b=2',
      summary: 'Atom summary',
      updated: '2026-10-19T01:02:03Z',
      updated_parsed: [2026, 10, 19, 1, 2, 3],
    });
  });

  it('builds news search urls', () => {
    expect(service.buildSearchUrl('OpenAI+OR+Anthropic')).toBe(
      'https://news.google.com/rss/search?q=OpenAI+OR+Anthropic&hl=en&gl=US&ceid=US:en',
    );
  });

  it('stops fetching once the entry cap is reached', async () => {
    const fetchSpy = jest
      .spyOn(global, 'fetch')
      .mockImplementation(async () => new Response(RSS, { status: 200 }));

    const entries = await service.fetchFeeds(
      ['https://a.example/rss', 'https://b.example/rss'],
      1,
      1,
    );

    expect(fetchSpy).toHaveBeenCalledTimes(1);
    expect(entries).toHaveLength(1);
    expect(entries[0]?.sourceName).toBe('Example News');
    expect(healthSpy).toHaveBeenCalledWith('https://a.example/rss', true);
  });

  it('skips failing feeds and records their health', async () => {
    jest
      .spyOn(global, 'fetch')
      .mockImplementationOnce(async () => new Response('', { status: 503 }))
      .mockImplementationOnce(async () => {
        throw new Error('socket hang up');
      })
      .mockImplementationOnce(async () => new Response(ATOM, { status: 200 }));

    const entries = await service.fetchFeeds(
      ['https://a.example', 'https://b.example', 'https://c.example'],
      10,
      3,
    );

    expect(entries).toHaveLength(1);
    expect(entries[0]?.sourceName).toBe('Atom Source');
    expect(healthSpy).toHaveBeenNthCalledWith(
      1,
      'https://a.example',
      false,
      'HTTP 503',
    );
    expect(healthSpy).toHaveBeenNthCalledWith(
      2,
      'https://b.example',
      false,
      'socket hang up',
    );
  });

  it('caps entries per search query under one source', async () => {
    const fetchSpy = jest
      .spyOn(global, 'fetch')
      .mockImplementation(async () => new Response(RSS, { status: 200 }));

    const entries = await service.fetchSearchFeeds(
      ['claude', 'gemini'],
      1,
      'Google News',
    );

    expect(fetchSpy).toHaveBeenCalledTimes(2);
    expect(entries.map((entry) => entry.sourceName)).toEqual([
      'Google News',
      'Google News',
    ]);
  });
});
