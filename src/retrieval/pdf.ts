import { readFile } from 'fs/promises';
import { extractText, getDocumentProxy } from 'unpdf';

/**
 * Text of every page of a PDF, pages joined in order
 */
export async function extractPdfText(path: string): Promise<string> {
    const data = await readFile(path);
    const pdf = await getDocumentProxy(new Uint8Array(data));
    const { text } = await extractText(pdf, { mergePages: true });
    return text;
}
