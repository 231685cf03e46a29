const BASE_HEADERS: Readonly<Record<string, string>> = {
  accept:
    'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,image/apng,*/*;q=0.8,application/signed-exchange;v=b3;q=0.7',
  'accept-language': 'en-US,en;q=0.9',
  'accept-encoding': 'gzip, deflate, br',
  'upgrade-insecure-requests': '1',
  'sec-fetch-dest': 'document',
  'sec-fetch-mode': 'navigate',
  'sec-fetch-site': 'none',
  'sec-fetch-user': '?1',
  dnt: '1',
  referer: 'https://www.google.com/',
};

export function pickUserAgent(pool: readonly string[], random: () => number = Math.random): string {
  const index = Math.min(pool.length - 1, Math.floor(random() * pool.length));
  return pool[index] ?? '';
}

export function buildRequestHeaders(userAgent: string): Record<string, string> {
  return { ...BASE_HEADERS, 'user-agent': userAgent };
}
