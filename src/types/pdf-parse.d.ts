/**
 * pdf-parse's package entry point runs a self-test when it is not loaded via
 * require(), so the library module is imported directly. Its result and option
 * types are the package's published ones; the data argument is the typed array
 * the library hands to pdf.js.
 */
declare module 'pdf-parse/lib/pdf-parse.js' {
  import PdfParse = require('pdf-parse');

  function pdfParse(dataBuffer: Uint8Array, options?: PdfParse.Options): Promise<PdfParse.Result>;
  export = pdfParse;
}
