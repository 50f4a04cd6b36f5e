import { DigestDedupeService } from './digest-dedupe.service';

describe('DigestDedupeService', () => {
  let service: DigestDedupeService;

  beforeEach(() => {
    service = new DigestDedupeService();
  });

  it('normalizes the url into the identity key', () => {
    expect(
      service.identityKey({ url: '  HTTPS://Example.com/A ', title: 'x' }),
    ).toBe('url:https://example.com/a');
  });

  it('falls back to the title when the url is empty', () => {
    expect(service.identityKey({ url: '', title: ' Big News ' })).toBe(
      'title:big news',
    );
    expect(service.identityKey({ url: ' ', title: '' })).toBe('');
  });

  it('does not match a url-less title against an equal url', () => {
    const duplicate = service.isDuplicate(
      { url: '', title: 'https://example.com/story' },
      [{ url: 'https://example.com/story', title: 'Launch day recap' }],
    );

    expect(duplicate).toBe(false);
  });

  it('flags an exact url match regardless of title', () => {
    const duplicate = service.isDuplicate(
      { url: 'https://example.com/a', title: 'Completely different words' },
      [{ url: 'https://EXAMPLE.com/a', title: 'Original headline here' }],
    );

    expect(duplicate).toBe(true);
  });

  it('flags titles sharing three of the first five words', () => {
    const duplicate = service.isDuplicate(
      {
        url: 'https://example.com/b',
        title: 'OpenAI releases GPT-5 model this week',
      },
      [
        {
          url: 'https://example.com/a',
          title: 'OpenAI releases GPT-5 model today',
        },
      ],
    );

    expect(duplicate).toBe(true);
  });

  it('keeps titles sharing only two leading words', () => {
    const duplicate = service.isDuplicate(
      { url: 'https://example.com/b', title: 'Apple unveils new headset' },
      [
        {
          url: 'https://example.com/a',
          title: 'Apple unveils quarterly results',
        },
      ],
    );

    expect(duplicate).toBe(false);
  });

  it('only compares the first five title words', () => {
    const duplicate = service.isDuplicate(
      { url: 'u2', title: 'one two three four five alpha beta gamma' },
      [{ url: 'u1', title: 'six seven eight nine ten alpha beta gamma' }],
    );

    expect(duplicate).toBe(false);
  });

  it('tracks accepted items in a ledger', () => {
    const ledger = service.createLedger();
    ledger.accept({ url: 'https://example.com/a', title: 'First story' });

    expect(ledger.size).toBe(1);
    expect(
      ledger.isDuplicate({ url: 'https://example.com/a', title: 'Other' }),
    ).toBe(true);
    expect(
      ledger.isDuplicate({ url: 'https://example.com/b', title: 'Other' }),
    ).toBe(false);
  });
});
