/**
 * Matches the first self-closing base element with a double-quoted href. Lazy
 * so that the match ends at the first closing quote, not the last one in the
 * document.
 */
const BASE_HREF = /(<base href=").*?("\s*\/>)/;

/**
 * Point the first `<base href="..." />` of an HTML document at `base`. The
 * surrounding markup is kept byte for byte; documents without such an element
 * come back unchanged.
 *
 * "$" characters are dropped from `base`, as they would be taken for
 * replacement patterns.
 */
export function rewriteBaseHref(html: string, base: string): string {
	const href = base.replaceAll("$", "");
	return html.replace(BASE_HREF, `$1${href}$2`);
}
