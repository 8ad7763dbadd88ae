/** Whitespace-delimited token count. The only source of a chapter's word count. */
export function countWords(content: string): number {
	const trimmed = content.trim();
	return trimmed.length === 0 ? 0 : trimmed.split(/\s+/).length;
}
