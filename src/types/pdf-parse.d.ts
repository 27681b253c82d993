// pdf-parse's package entry runs a self-test when loaded as an ES module;
// its library file is imported directly and keeps the published typings.
declare module "pdf-parse/lib/pdf-parse.js" {
  import pdfParse from "pdf-parse";
  export default pdfParse;
}
