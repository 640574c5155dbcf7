import { extractPage } from './html-extractor';

describe('extractPage', () => {
  const html = `
    <html>
      <head><title> Rosa's Bakery </title><style>p { color: red }</style></head>
      <body>
        <header><a href="/">Home</a></header>
        <nav><a href="/about">About</a><a href="/login">Login</a></nav>
        <main>
          <h1>Fresh bread daily</h1>
          <p>Family run   since 1998.</p>
          <script>track()</script>
          <a href="/menu/">Menu</a>
        </main>
        <footer>Copyright</footer>
      </body>
    </html>`;

  it('should read the title and main content as lines', () => {
    const page = extractPage(html, 'https://rosa.example.com/', 5000);

    expect(page.title).toBe("Rosa's Bakery");
    expect(page.text).toBe('Fresh bread daily\nFamily run since 1998.');
  });

  it('should collect filtered links from the whole page as absolute URLs', () => {
    const page = extractPage(html, 'https://rosa.example.com/', 5000);

    expect(page.links).toEqual([
      'https://rosa.example.com/about',
      'https://rosa.example.com/menu',
    ]);
  });

  it('should not link back to the page itself', () => {
    const page = extractPage(html, 'https://rosa.example.com/about', 5000);

    expect(page.links).toEqual(['https://rosa.example.com/menu']);
  });

  it('should cut text at the character limit', () => {
    const page = extractPage(html, 'https://rosa.example.com/', 10);

    expect(page.text).toBe('Fresh brea...');
  });

  it('should fall back to the body when there is no main or article', () => {
    const page = extractPage(
      '<html><body><div>Open Monday to Friday</div></body></html>',
      'https://rosa.example.com/',
      5000,
    );

    expect(page.text).toBe('Open Monday to Friday');
    expect(page.title).toBeNull();
  });
});
