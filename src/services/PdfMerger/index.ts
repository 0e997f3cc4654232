export * from "./PdfMerger";
export * from "./PdfMergerPdfLib";
