const ESCAPE = /\$[0-9a-fA-F]{2}|\\\r\n|\\[\s\S]/g;

/**
 * Decode a Mork literal.
 *
 * - `$XX` becomes the character with byte value XX
 * - a backslash before CR LF or LF is a line continuation and disappears
 * - a backslash before any other character yields that character
 */
export function unescape(raw: string): string {
	return raw.replace(ESCAPE, (match) => {
		if (match.startsWith("$")) {
			return String.fromCharCode(parseInt(match.slice(1), 16));
		}
		const escaped = match.slice(1);
		if (escaped === "\r\n" || escaped === "\n") {
			return "";
		}
		return escaped;
	});
}
