// Template Parser - reads paragraph styles out of a .docx style template

import { readFile } from 'fs/promises';
import { DOMParser } from '@xmldom/xmldom';
import JSZip from 'jszip';
import { TemplateError, describeError } from '../errors';
import { getLogger } from '../logging/logger';
import type { StyleCatalog, StyleDefinition } from '../types/document.types';

const logger = getLogger('template-parser');

const STYLES_PART = 'word/styles.xml';

function isEnabled(value: string | null): boolean {
  return value === '1' || value === 'true' || value === 'on';
}

/**
 * Extract paragraph style definitions from word/styles.xml. Character, table
 * and numbering styles are ignored. Malformed XML throws.
 */
export function parseStylesXml(stylesXml: string): StyleCatalog {
  const parser = new DOMParser({
    errorHandler: {
      warning: (message: string) => logger.debug(`styles.xml: ${message}`),
      error: (message: string) => {
        throw new Error(`Malformed styles.xml: ${message}`);
      },
      fatalError: (message: string) => {
        throw new Error(`Malformed styles.xml: ${message}`);
      }
    }
  });
  const doc = parser.parseFromString(stylesXml, 'application/xml');

  const paragraphStyles: StyleDefinition[] = [];
  const styleElements = doc.getElementsByTagName('w:style');

  for (let i = 0; i < styleElements.length; i++) {
    const style = styleElements[i];
    const styleId = style.getAttribute('w:styleId');
    if (style.getAttribute('w:type') !== 'paragraph' || !styleId) {
      continue;
    }

    const name = style.getElementsByTagName('w:name').item(0)?.getAttribute('w:val');

    paragraphStyles.push({
      id: styleId,
      name: name || styleId,
      isDefault: isEnabled(style.getAttribute('w:default'))
    });
  }

  return { paragraphStyles, stylesXml };
}

export async function parseTemplateBuffer(buffer: Buffer | ArrayBuffer, templatePath: string): Promise<StyleCatalog> {
  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(buffer);
  } catch (error) {
    throw new TemplateError(`Template is not a valid DOCX archive: ${describeError(error)}`, templatePath);
  }

  const stylesXml = await zip.file(STYLES_PART)?.async('string');
  if (!stylesXml) {
    throw new TemplateError(`Invalid DOCX template: missing ${STYLES_PART}`, templatePath);
  }

  try {
    return parseStylesXml(stylesXml);
  } catch (error) {
    throw new TemplateError(describeError(error), templatePath);
  }
}

/**
 * Load the style catalog of a template. A template that does not exist yields
 * null (the built-in styles are used); an unreadable one raises TemplateError.
 */
export async function loadStyleTemplate(templatePath: string): Promise<StyleCatalog | null> {
  let buffer: Buffer;
  try {
    buffer = await readFile(templatePath);
  } catch (error) {
    logger.warn(`Template not readable at ${templatePath}, using built-in styles (${describeError(error)})`);
    return null;
  }

  const catalog = await parseTemplateBuffer(buffer, templatePath);
  logger.info(`Loaded ${catalog.paragraphStyles.length} paragraph styles from ${templatePath}`);
  return catalog;
}
