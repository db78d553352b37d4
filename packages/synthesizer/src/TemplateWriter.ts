import { assertValidStackName, debug, TemplateDocument } from '@linkstack/contracts';
import * as fs from 'node:fs';
import path from 'node:path';

export const DEFAULT_OUT_DIR = 'linkstack.out';
export const TEMPLATE_SUFFIX = '.template.json';

export function validateTemplateDocument(document: unknown): document is TemplateDocument {
  if (!document || typeof document !== 'object') return false;

  const doc = document as Partial<TemplateDocument>;
  return (
    typeof doc.Description === 'string' &&
    typeof doc.Metadata === 'object' &&
    doc.Metadata !== null &&
    typeof doc.Resources === 'object' &&
    doc.Resources !== null &&
    Array.isArray(doc.Outputs)
  );
}

/**
 * Writes synthesized templates to `<outDir>/<stackName>.template.json`.
 * The document goes to a temporary file first and is renamed into place, so a failed
 * write never leaves a truncated artifact behind.
 */
export class TemplateWriter {
  readonly outDir: string;

  constructor(outDir: string = DEFAULT_OUT_DIR) {
    this.outDir = path.resolve(process.cwd(), outDir);
  }

  pathFor(stackName: string): string {
    assertValidStackName(stackName);
    return path.join(this.outDir, `${stackName}${TEMPLATE_SUFFIX}`);
  }

  write(stackName: string, content: string): string {
    const targetPath = this.pathFor(stackName);
    const tempPath = `${targetPath}.tmp`;

    fs.mkdirSync(this.outDir, { recursive: true });

    try {
      const fd = fs.openSync(tempPath, 'w');
      try {
        fs.writeFileSync(fd, content, 'utf8');
      } finally {
        fs.closeSync(fd);
      }
      fs.renameSync(tempPath, targetPath);
    } catch (error) {
      fs.rmSync(tempPath, { force: true });
      throw error;
    }

    debug(`Wrote ${targetPath}`);
    return targetPath;
  }

  read(templatePath: string): TemplateDocument {
    const content = fs.readFileSync(path.resolve(process.cwd(), templatePath), 'utf8');
    const document: unknown = JSON.parse(content);
    if (!validateTemplateDocument(document)) throw new Error(`${templatePath} is not a synthesized template`);

    return document;
  }
}
