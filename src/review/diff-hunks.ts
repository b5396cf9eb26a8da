/**
 * Line-level hunk computation for edit review
 */

import { diffLines } from 'diff';
import { DiffHunk, HunkKind, RawHunk } from './types';

export const DEFAULT_MAX_UNCHANGED_LINES = 5;

export interface LineDiffOptions {
	/** Longest unchanged block shown in full when truncating */
	maxUnchangedLines?: number;

	/**
	 * Elide long unchanged blocks for display.
	 * Must be false whenever the hunks are used to rebuild content.
	 */
	truncateUnchanged?: boolean;
}

/**
 * Split text into lines, keeping each line's terminator
 */
export function splitLines(text: string): string[] {
	return text.match(/[^\n]*\n|[^\n]+$/g) ?? [];
}

/**
 * Compute hunks between original and proposed content
 */
export function computeLineDiff(
	original: string,
	proposed: string,
	options: LineDiffOptions = {}
): RawHunk[] {
	const {
		maxUnchangedLines = DEFAULT_MAX_UNCHANGED_LINES,
		truncateUnchanged = true,
	} = options;

	if (!original && !proposed) {
		return [];
	}

	if (!original) {
		return [{
			kind: 'added',
			original: '',
			proposed,
			origLineCount: 0,
			newLineCount: splitLines(proposed).length,
		}];
	}

	if (!proposed) {
		return [{
			kind: 'removed',
			original,
			proposed: '',
			origLineCount: splitLines(original).length,
			newLineCount: 0,
		}];
	}

	const hunks: RawHunk[] = [];
	// Removed/added lines seen since the last equal run
	let removedText = '';
	let addedText = '';
	let removedCount = 0;
	let addedCount = 0;

	const flushChanges = () => {
		if (removedCount === 0 && addedCount === 0) return;

		let kind: HunkKind;
		if (removedCount > 0 && addedCount > 0) {
			kind = 'modified';
		} else if (addedCount > 0) {
			kind = 'added';
		} else {
			kind = 'removed';
		}

		hunks.push({
			kind,
			original: removedText,
			proposed: addedText,
			origLineCount: removedCount,
			newLineCount: addedCount,
		});
		removedText = '';
		addedText = '';
		removedCount = 0;
		addedCount = 0;
	};

	for (const change of diffLines(original, proposed)) {
		const lineCount = change.count ?? splitLines(change.value).length;

		if (change.removed) {
			removedText += change.value;
			removedCount += lineCount;
		} else if (change.added) {
			addedText += change.value;
			addedCount += lineCount;
		} else {
			flushChanges();
			const displayText = truncateUnchanged
				? elideUnchangedText(change.value, maxUnchangedLines)
				: change.value;
			hunks.push({
				kind: 'unchanged',
				original: displayText,
				proposed: displayText,
				origLineCount: lineCount,
				newLineCount: lineCount,
			});
		}
	}
	flushChanges();

	return mergeConsecutiveHunks(hunks);
}

/**
 * Shorten a long unchanged block to its leading and trailing lines.
 * Display only: the result must never be used to rebuild content.
 */
export function elideUnchangedText(text: string, maxLines: number): string {
	const lines = splitLines(text);
	const half = Math.max(1, Math.floor(maxLines / 2));
	const hidden = lines.length - half * 2;

	if (lines.length <= maxLines || hidden <= 0) {
		return text;
	}

	return (
		lines.slice(0, half).join('') +
		`... (${hidden} lines unchanged) ...\n` +
		lines.slice(-half).join('')
	);
}

function mergeConsecutiveHunks(hunks: RawHunk[]): RawHunk[] {
	const merged: RawHunk[] = [];

	for (const hunk of hunks) {
		const last = merged[merged.length - 1];
		if (last && last.kind === hunk.kind) {
			merged[merged.length - 1] = {
				kind: last.kind,
				original: last.original + hunk.original,
				proposed: last.proposed + hunk.proposed,
				origLineCount: last.origLineCount + hunk.origLineCount,
				newLineCount: last.newLineCount + hunk.newLineCount,
			};
		} else {
			merged.push(hunk);
		}
	}

	return merged;
}

/**
 * Assign positional ids and line ranges to hunks.
 * Ranges come from the true line counts, so elided display text does not skew them.
 */
export function annotateHunksWithIds(hunks: readonly RawHunk[]): DiffHunk[] {
	let origLine = 1;
	let newLine = 1;

	return hunks.map((hunk, index) => {
		const origLen = hunk.origLineCount;
		const newLen = hunk.newLineCount;
		const hasOrig = hunk.kind !== 'added' && origLen > 0;
		const hasNew = hunk.kind !== 'removed' && newLen > 0;

		const annotated: DiffHunk = {
			...hunk,
			id: `h${index + 1}`,
			origStart: hasOrig ? origLine : null,
			origEnd: hasOrig ? origLine + origLen - 1 : null,
			newStart: hasNew ? newLine : null,
			newEnd: hasNew ? newLine + newLen - 1 : null,
		};

		origLine += origLen;
		newLine += newLen;
		return annotated;
	});
}

/**
 * Elide long unchanged hunks after annotation, keeping ids and ranges
 */
export function truncateUnchangedForDisplay(
	hunks: readonly DiffHunk[],
	maxLines: number = DEFAULT_MAX_UNCHANGED_LINES
): DiffHunk[] {
	return hunks.map(hunk => {
		if (hunk.kind !== 'unchanged') return hunk;

		const displayText = elideUnchangedText(hunk.original, maxLines);
		return displayText === hunk.original
			? hunk
			: { ...hunk, original: displayText, proposed: displayText };
	});
}

/**
 * Count hunks by kind
 */
export function countChanges(hunks: readonly RawHunk[]): Record<HunkKind, number> {
	const counts: Record<HunkKind, number> = { added: 0, removed: 0, modified: 0, unchanged: 0 };
	for (const hunk of hunks) {
		counts[hunk.kind]++;
	}
	return counts;
}
