/** Quote a string for a POSIX shell using single quotes. */
export function shellQuote(text: string): string {
	return `'${text.replace(/'/g, "'\\''")}'`;
}
