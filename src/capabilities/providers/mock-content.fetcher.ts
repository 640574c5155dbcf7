import { Injectable } from '@nestjs/common';
import {
  ContentFetcher,
  FetchOptions,
  FetchResult,
} from '../interfaces/capabilities.interface';

/** Serves a small fixed site for any URL. */
@Injectable()
export class MockContentFetcher implements ContentFetcher {
  fetch(url: string, options: FetchOptions): Promise<FetchResult> {
    const path = new URL(url).pathname;
    const html = `<html><head><title>Mock ${path}</title></head><body>
<nav><a href="/">Home</a><a href="/about">About</a><a href="/services">Services</a><a href="/contact">Contact</a></nav>
<main><h1>Welcome to ${path}</h1><p>We have served the neighbourhood for twenty years.</p></main>
</body></html>`;
    const body = html.slice(0, options.maxBytes);
    return Promise.resolve({
      found: true,
      url,
      html: body,
      bytes: Buffer.byteLength(body),
      truncated: body.length < html.length,
    });
  }
}
