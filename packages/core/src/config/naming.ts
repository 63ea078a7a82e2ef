/** Dataset key derived from a client name: lowercased, spaces and hyphens → `_`. */
export function toClientKey(clientName: string): string {
	return clientName.toLowerCase().replace(/ /g, "_").replace(/-/g, "_");
}

/** Value of the `client` label: lowercased, spaces → `_` (hyphens kept). */
export function toClientLabel(clientName: string): string {
	return clientName.toLowerCase().replace(/ /g, "_");
}

function isCased(ch: string): boolean {
	return ch.toLowerCase() !== ch.toUpperCase();
}

/**
 * Title-case a key: the first letter of every run of letters is uppercased
 * and the rest lowercased. Any non-letter starts a new run, so
 * `acme_co` becomes `Acme_Co` and `q4report` becomes `Q4Report`.
 */
export function titleCase(text: string): string {
	let out = "";
	let inWord = false;
	for (const ch of text) {
		if (isCased(ch)) {
			out += inWord ? ch.toLowerCase() : ch.toUpperCase();
			inWord = true;
		} else {
			out += ch;
			inWord = false;
		}
	}
	return out;
}
