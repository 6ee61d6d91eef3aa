import { JSDOM } from 'jsdom';

export const NOISE_SELECTOR = 'script, style, noscript, header, footer, nav, aside, form';

const MAIN_SELECTORS = ['main', '#main', 'article', '.main', '.mainContents'];

export interface HtmlPage {
  document: Document;
  url: string;
}

export function parseHtml(html: string, url: string): HtmlPage {
  const dom = new JSDOM(html, { url });
  return { document: dom.window.document, url };
}

/**
 * Text of an element with one line per text node, blank-line runs collapsed.
 */
export function elementText(el: Element): string {
  const lines: string[] = [];
  const walk = (node: Node): void => {
    for (const child of Array.from(node.childNodes)) {
      if (child.nodeType === 3) {
        const text = child.textContent?.trim();
        if (text) lines.push(text);
      } else if (child.nodeType === 1) {
        walk(child);
      }
    }
  };
  walk(el);
  return lines.join('\n').replace(/\n{3,}/g, '\n\n');
}

export function removeNoise(root: ParentNode, selector: string = NOISE_SELECTOR): void {
  for (const el of Array.from(root.querySelectorAll(selector))) {
    el.remove();
  }
}

/**
 * Page heading: the first non-empty <h1>, else <title>.
 */
export function pickTitle(document: Document): string {
  const h1 = document.querySelector('h1')?.textContent?.trim();
  if (h1) return h1;
  return document.title.trim();
}

export function mainContent(document: Document): Element | null {
  for (const selector of MAIN_SELECTORS) {
    const el = document.querySelector(selector);
    if (el) return el;
  }
  return document.body;
}

export interface PageLink {
  href: string;
  text: string;
}

/**
 * Absolute http(s) links of the page, fragment stripped, in document order.
 */
export function extractLinks(page: HtmlPage): PageLink[] {
  const links: PageLink[] = [];
  for (const a of Array.from(page.document.querySelectorAll('a[href]'))) {
    const raw = a.getAttribute('href');
    if (!raw) continue;
    let resolved: URL;
    try {
      resolved = new URL(raw, page.url);
    } catch {
      continue;
    }
    if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') continue;
    resolved.hash = '';
    links.push({ href: resolved.toString(), text: a.textContent?.trim() ?? '' });
  }
  return links;
}

/**
 * Strip HTML tags and decode common entities, keeping paragraph breaks.
 */
export function stripHtml(html: string): string {
  let text = html.replace(/<(script|style)[^>]*>[\s\S]*?<\/\1>/gi, '');
  text = text.replace(/<\s*br\s*\/?>/gi, '\n').replace(/<\/(p|div|li|h[1-6])\s*>/gi, '\n\n');
  text = text.replace(/<[^>]+>/g, ' ');
  return text
    .replace(/&nbsp;/g, ' ')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&amp;/g, '&');
}

export function compilePatterns(patterns: readonly string[]): RegExp[] {
  return patterns.filter((p) => p.length > 0).map((p) => new RegExp(p, 'i'));
}

export function matchesAny(patterns: readonly RegExp[], text: string): boolean {
  return patterns.some((p) => p.test(text));
}
