import {appendFile} from 'node:fs/promises';

/**
 * The comment block written once at the top of every run, e.g.
 * `# Keys translated automatically on 3/7/2026.`
 */
export function translationHeader(date: Date): string {
	const timestamp = `${date.getMonth() + 1}/${date.getDate()}/${date.getFullYear()}`;
	return [
		'# ',
		`# Keys translated automatically on ${timestamp}.`,
		'# ',
	].join('\n');
}

/**
 * Appends a block to the destination, preceded by a blank line, in one write.
 * The destination is never truncated, so repeated runs accumulate.
 *
 * @returns `false` when the content is blank and nothing was written
 */
export async function appendBlock(destination: string, content: string): Promise<boolean> {
	if (content.trim() === '') {
		return false;
	}

	await appendFile(destination, `\n${content}\n`, 'utf8');
	return true;
}
