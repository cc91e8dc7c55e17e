/**
 * Browser-side scripts run through page.evaluate().
 *
 * Kept as strings so they execute verbatim in the page, without the compiler
 * rewriting them for the Node.js target.
 */

/** Attribute stamped on each interactive element by INTERACTIVE_ELEMENTS_SCRIPT */
export const ELEMENT_INDEX_ATTRIBUTE = 'data-agent-index';

/** Maximum characters of element text returned to clients */
export const MAX_ELEMENT_TEXT_LENGTH = 100;

/** Maximum characters of page text handed to extraction */
export const MAX_CONTENT_TEXT_LENGTH = 20000;

/**
 * Enumerates visible interactive elements in document order, numbers them
 * from 0 and stamps the number on the element. Previous stamps are cleared
 * first so an index always refers to the latest enumeration.
 *
 * Returns: Array<{ index, tag, text, placeholder, href }>
 */
export const INTERACTIVE_ELEMENTS_SCRIPT = `
(function() {
  const ATTR = '${ELEMENT_INDEX_ATTRIBUTE}';
  const MAX_TEXT = ${MAX_ELEMENT_TEXT_LENGTH};
  const SELECTOR = [
    'a[href]',
    'button',
    'input:not([type="hidden"])',
    'select',
    'textarea',
    'summary',
    '[role="button"]',
    '[role="link"]',
    '[role="checkbox"]',
    '[role="tab"]',
    '[role="menuitem"]',
    '[onclick]',
    '[contenteditable="true"]',
    '[tabindex]:not([tabindex="-1"])'
  ].join(',');

  document.querySelectorAll('[' + ATTR + ']').forEach(function(el) {
    el.removeAttribute(ATTR);
  });

  function isVisible(el) {
    const rect = el.getBoundingClientRect();
    if (rect.width === 0 || rect.height === 0) return false;
    const style = window.getComputedStyle(el);
    return style.visibility !== 'hidden' && style.display !== 'none' && style.opacity !== '0';
  }

  function labelOf(el) {
    const raw = el.innerText || el.value || el.getAttribute('aria-label') || el.getAttribute('title') || '';
    return String(raw).replace(/\\s+/g, ' ').trim().slice(0, MAX_TEXT);
  }

  const result = [];
  const seen = new Set();
  document.querySelectorAll(SELECTOR).forEach(function(el) {
    if (seen.has(el) || el.disabled || !isVisible(el)) return;
    seen.add(el);
    const index = result.length;
    el.setAttribute(ATTR, String(index));
    const entry = { index: index, tag: el.tagName.toLowerCase(), text: labelOf(el) };
    const placeholder = el.getAttribute('placeholder');
    if (placeholder) entry.placeholder = placeholder;
    if (el.tagName === 'A' && el.href) entry.href = el.href;
    result.push(entry);
  });
  return result;
})()
`;

/**
 * Reads the page's visible text and its links.
 *
 * Returns: { text, links: Array<{ text, href }> }
 */
export const PAGE_CONTENT_SCRIPT = `
(function() {
  const MAX_TEXT = ${MAX_CONTENT_TEXT_LENGTH};
  const text = (document.body ? document.body.innerText : '').slice(0, MAX_TEXT);
  const links = [];
  document.querySelectorAll('a[href]').forEach(function(a) {
    const label = (a.innerText || a.getAttribute('aria-label') || '').replace(/\\s+/g, ' ').trim();
    if (a.href && !a.href.startsWith('javascript:')) {
      links.push({ text: label, href: a.href });
    }
  });
  return { text: text, links: links };
})()
`;

/**
 * Scrolls by one viewport height. Call with the sign of the direction.
 */
export function scrollScript(sign: 1 | -1): string {
  return `window.scrollBy(0, ${sign} * window.innerHeight)`;
}
