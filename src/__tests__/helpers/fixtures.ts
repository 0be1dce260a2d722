/**
 * Test Fixtures
 * Reusable test data
 */

export const PAGE_URL = 'https://example.com/blog/post';

export const articleHtml = `<!DOCTYPE html>
<html>
<head>
  <title>Sample Article</title>
  <meta name="description" content="A short article used in tests">
  <meta name="keywords" content="crawler, testing">
  <meta property="og:title" content="Sample Article OG">
  <style>body { color: red; }</style>
</head>
<body>
  <nav><a href="/home">Home page link</a></nav>
  <main>
    <h1>Understanding Crawlers</h1>
    <p>Crawlers fetch pages and turn them into clean content.</p>
    <p>Short one</p>
    <p>Read the <a href="/docs/intro#top">introduction guide</a> before starting.</p>
    <ul>
      <li>Concurrency is bounded</li>
      <li>Proxies rotate in order</li>
    </ul>
    <img src="/images/diagram.png" alt="Diagram">
    <script>window.tracking = true;</script>
    <!-- internal note -->
  </main>
  <footer><p>Copyright notice for the site</p></footer>
</body>
</html>`;

export const articleMarkdown = [
  '# Understanding Crawlers',
  '',
  'Crawlers fetch pages and turn them into clean content.',
  '',
  'Read the [introduction guide](https://example.com/docs/intro) before starting.',
  '',
  '- Concurrency is bounded',
  '- Proxies rotate in order',
  '',
  '![Diagram](https://example.com/images/diagram.png)',
].join('\n');

export const articleText = [
  'Understanding Crawlers',
  'Crawlers fetch pages and turn them into clean content.',
  'Read the introduction guide before starting.',
  'Concurrency is bounded',
  'Proxies rotate in order',
].join('\n\n');

export function simplePage(title: string, paragraph: string): string {
  return `<html><head><title>${title}</title></head><body><p>${paragraph}</p></body></html>`;
}
