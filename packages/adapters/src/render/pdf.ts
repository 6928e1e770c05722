import { jsPDF } from 'jspdf';
import {
    RenderingFailureError,
    type RenderedDocument,
    type WorksheetMeta,
    type WorksheetRecord,
    type WorksheetRenderer
} from '@worksheetbot/core';

const MARGIN_MM = 15;
const LINE_MM = 7;
const FONT = 'helvetica';

const TYPOGRAPHIC: Record<string, string> = {
    '\u2018': "'", '\u2019': "'", '\u201C': '"', '\u201D': '"',
    '\u2013': '-', '\u2014': '-', '\u2026': '...', '\u2022': '-'
};

/**
 * Reduces text to what the built-in Latin-1 fonts can draw. jspdf writes a
 * whole line as UTF-16 when any character falls outside that set, which
 * standard fonts render as garbage. Accented letters lose their accent when
 * that brings them in range; emoji and other symbols are dropped.
 */
export function toPdfText(text: string): string {
    let out = '';
    for (const char of text) {
        const replacement = TYPOGRAPHIC[char];
        if (replacement !== undefined) {
            out += replacement;
            continue;
        }
        if ((char.codePointAt(0) ?? 0) <= 0xff) {
            out += char;
            continue;
        }
        const base = char.normalize('NFKD').replace(/[\u0300-\u036f]/g, '');
        if ([...base].every((part) => (part.codePointAt(0) ?? 0) <= 0xff)) {
            out += base;
        }
    }
    return out.replace(/ {2,}/g, ' ').trim();
}

/** Writes top-down, wrapping to the page width and breaking pages as needed. */
class PageCursor {
    private y = MARGIN_MM;

    public constructor(private readonly doc: jsPDF) { }

    private get width(): number {
        return this.doc.internal.pageSize.getWidth() - MARGIN_MM * 2;
    }

    private get bottom(): number {
        return this.doc.internal.pageSize.getHeight() - MARGIN_MM;
    }

    public heading(text: string, size: number, align: 'left' | 'center' = 'left'): void {
        this.doc.setFont(FONT, 'bold');
        this.doc.setFontSize(size);
        this.line(toPdfText(text), align);
    }

    public paragraph(text: string): void {
        this.doc.setFont(FONT, 'normal');
        this.doc.setFontSize(12);
        const lines: string[] = this.doc.splitTextToSize(toPdfText(text), this.width);
        for (const line of lines) {
            this.line(line, 'left');
        }
    }

    private line(text: string, align: 'left' | 'center'): void {
        if (this.y + LINE_MM > this.bottom) {
            this.doc.addPage();
            this.y = MARGIN_MM;
        }
        this.y += LINE_MM;
        const x = align === 'center' ? this.doc.internal.pageSize.getWidth() / 2 : MARGIN_MM;
        this.doc.text(text, x, this.y, { align });
    }
}

export class PdfWorksheetRenderer implements WorksheetRenderer {
    public readonly format = 'pdf' as const;

    public async render(record: WorksheetRecord, meta: WorksheetMeta): Promise<RenderedDocument> {
        try {
            const doc = new jsPDF({ unit: 'mm', format: 'a4' });
            doc.setProperties({ title: toPdfText(record.title), creator: 'WorksheetBot' });

            const cursor = new PageCursor(doc);
            cursor.heading(record.title, 16, 'center');
            cursor.paragraph(`Date: ${meta.date} - Created for ${meta.child}`);

            cursor.heading('Instructions:', 14);
            cursor.paragraph(record.instructions);

            for (const section of record.sections) {
                cursor.heading(section.name, 14);
                section.questions.forEach((question, index) => {
                    cursor.paragraph(`${index + 1}. ${question}`);
                });
            }

            cursor.heading('Parent Tips:', 14);
            cursor.paragraph(record.tips);

            return {
                content: Buffer.from(doc.output('arraybuffer')),
                mimeType: 'application/pdf',
                extension: 'pdf'
            };
        } catch (error) {
            throw RenderingFailureError.from(this.format, error);
        }
    }
}
