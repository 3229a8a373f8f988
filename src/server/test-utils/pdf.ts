import PDFDocument from 'pdfkit';

/**
 * Render a PDF with one page per entry. An empty string produces a page
 * without any text.
 */
export function buildPdf(pages: readonly string[]): Promise<Buffer> {
    return new Promise((resolve, reject) => {
        const doc = new PDFDocument({ autoFirstPage: false });
        const chunks: Buffer[] = [];

        doc.on('data', (chunk: Buffer) => chunks.push(chunk));
        doc.on('end', () => resolve(Buffer.concat(chunks)));
        doc.on('error', reject);

        for (const text of pages) {
            doc.addPage();
            if (text.length > 0) {
                doc.fontSize(12).text(text);
            }
        }
        doc.end();
    });
}
