// pdf-parse's entry file runs a self-test when imported as ESM; the library file has the same API
declare module 'pdf-parse/lib/pdf-parse.js' {
  import pdfParse from 'pdf-parse';
  export default pdfParse;
}
