import fs from 'fs-extra';
import path from 'path';
import { info } from './log';
import type { BionicDocument, BionicToken, BookInput, DocumentAssembler } from './types';

export const WORDS_PER_PART = 1000;

const STYLE = 'body { font-family: sans-serif; line-height: 1.6; padding: 5%; } b { font-weight: bold; }';

export function escapeHtml(s: string): string {
    return s
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;');
}

export function renderToken(t: BionicToken): string {
    if (t.boldPrefixLength === 0) return escapeHtml(t.word);
    const boldEnd = t.coreStart + t.boldPrefixLength;
    return (
        escapeHtml(t.word.slice(0, t.coreStart)) +
        `<b>${escapeHtml(t.word.slice(t.coreStart, boldEnd))}</b>` +
        escapeHtml(t.word.slice(boldEnd))
    );
}

function renderSeparator(sep: string): string {
    if (/\n\s*\n/.test(sep)) return '</p>\n<p>';
    if (sep.includes('\n')) return '<br/>\n';
    return sep ? ' ' : '';
}

/** Paragraph markup for a run of tokens; a paragraph break after the last token is not carried. */
export function renderTokens(tokens: BionicToken[]): string {
    const body = tokens
        .map((t, i) => renderToken(t) + (i + 1 < tokens.length ? renderSeparator(t.separator) : ''))
        .join('');
    return `<p>${body}</p>`;
}

export function splitParts(doc: BionicDocument, wordsPerPart = WORDS_PER_PART): BionicToken[][] {
    const parts: BionicToken[][] = [];
    for (let i = 0; i < doc.tokens.length; i += wordsPerPart) {
        parts.push(doc.tokens.slice(i, i + wordsPerPart));
    }
    return parts;
}

export function renderXhtml(title: string, doc: BionicDocument): string {
    const sections = splitParts(doc).map(
        (tokens, i) => `<section id="part-${i + 1}">\n<h2>Part ${i + 1}</h2>\n${renderTokens(tokens)}\n</section>`
    );
    return [
        '<?xml version="1.0" encoding="utf-8"?>',
        '<!DOCTYPE html>',
        '<html xmlns="http://www.w3.org/1999/xhtml" xml:lang="en" lang="en">',
        '<head>',
        '<meta charset="utf-8"/>',
        `<title>${escapeHtml(title)}</title>`,
        `<style>${STYLE}</style>`,
        '</head>',
        '<body>',
        `<h1>${escapeHtml(title)}</h1>`,
        ...sections,
        '</body>',
        '</html>',
        '',
    ].join('\n');
}

export function safeFileName(title: string): string {
    const cleaned = title.replace(/[^\p{L}\p{N}\s_-]/gu, '').trim().replace(/\s+/g, '_');
    return cleaned || 'Untitled_Video';
}

/** File stem of a book: the cleaned title suffixed with the video id, unique within a batch. */
export function bookFileStem(title: string, videoId: string): string {
    return `${safeFileName(title)}_${safeFileName(videoId)}`;
}

/** Writes `<title>_<videoId>.xhtml` plus a `.json` sidecar recording the run's status and degraded chunks. */
export class XhtmlBookWriter implements DocumentAssembler {
    constructor(private readonly outDir: string) {}

    async write(book: BookInput): Promise<string> {
        await fs.ensureDir(this.outDir);
        const base = path.join(this.outDir, bookFileStem(book.title, book.videoId));
        const outPath = `${base}.xhtml`;
        await fs.writeFile(outPath, renderXhtml(book.title, book.document), 'utf8');
        await fs.writeJson(
            `${base}.json`,
            {
                videoId: book.videoId,
                title: book.title,
                status: book.status,
                createdAt: book.createdAt,
                words: book.document.tokens.length,
                parts: splitParts(book.document).length,
                degradedChunks: book.degradedChunks,
            },
            { spaces: 2 }
        );
        info('book.write', { videoId: book.videoId, path: outPath, status: book.status });
        return outPath;
    }
}
