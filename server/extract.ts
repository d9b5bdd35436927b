import fs from 'fs/promises';
import path from 'path';
import { loadEnvironmentConfig } from './config/environment';
import { DocumentStructureProcessor } from './services/documentStructureProcessor';
import { serializeStructure } from './services/structureSerializer';

function defaultOutputPath(pdfPath: string): string {
  const baseName = path.basename(pdfPath, path.extname(pdfPath));
  return path.join(path.dirname(pdfPath), `${baseName}_structure.json`);
}

async function main() {
  const config = loadEnvironmentConfig();
  const pdfPath = process.argv[2] ?? config.PDF_PATH;
  if (!pdfPath) {
    throw new Error('No PDF given: pass a path or set PDF_PATH');
  }
  const outputPath = process.argv[3] ?? config.OUTPUT_PATH ?? defaultOutputPath(pdfPath);

  console.log(`📁 Reading PDF file: ${pdfPath}`);
  const data = await fs.readFile(pdfPath);

  const processor = new DocumentStructureProcessor({
    startPage: config.START_PAGE,
    chapterMarker: config.CHAPTER_MARKER,
    searchMode: config.SEARCH_MODE,
    descendIntoUnmatched: config.DESCEND_INTO_UNMATCHED,
  });
  const { structure } = await processor.processPdf(data);

  await fs.writeFile(outputPath, serializeStructure(structure, 4), 'utf8');
  console.log(`💾 Structure saved to ${outputPath}`);
}

main().catch(error => {
  console.error('❌ Extraction failed:', error instanceof Error ? error.message : error);
  process.exit(1);
});
