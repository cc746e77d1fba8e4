// Unit tests for the style template parser

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import JSZip from 'jszip';
import { DocumentAssembler } from '../../src/document/document-assembler';
import { findParagraphStyle } from '../../src/document/style-resolver';
import { TemplateError } from '../../src/errors';
import {
  loadStyleTemplate,
  parseStylesXml,
  parseTemplateBuffer
} from '../../src/parsers/template-parser';
import {
  createDocxLibraryTemplate,
  createStylesXml,
  createTemplateBuffer
} from '../helpers/docx-builder';

const W_NS = 'http://schemas.openxmlformats.org/wordprocessingml/2006/main';

describe('Template Parser', () => {
  describe('parseStylesXml', () => {
    it('should read paragraph styles and skip other style types', () => {
      const xml = createStylesXml([
        { id: 'Normal', name: 'Normal', isDefault: true },
        { id: 'BHKStandard', name: 'BHK_Standard' },
        { id: 'Strong', name: 'Strong', type: 'character' }
      ]);

      expect(parseStylesXml(xml)).toEqual({
        paragraphStyles: [
          { id: 'Normal', name: 'Normal', isDefault: true },
          { id: 'BHKStandard', name: 'BHK_Standard', isDefault: false }
        ],
        stylesXml: xml
      });
    });

    it('should decode XML entities in style names', () => {
      const xml = createStylesXml([{ id: 'QA', name: 'Q &amp; A' }]);

      expect(parseStylesXml(xml).paragraphStyles[0].name).toBe('Q & A');
    });

    it('should use the style id when the name is missing', () => {
      const xml = `<w:styles xmlns:w="${W_NS}"><w:style w:type="paragraph" w:styleId="Plain"></w:style></w:styles>`;

      expect(parseStylesXml(xml).paragraphStyles).toEqual([{ id: 'Plain', name: 'Plain', isDefault: false }]);
    });

    it('should accept single-quoted attributes', () => {
      const xml = `<w:styles xmlns:w='${W_NS}'>`
        + `<w:style w:type='paragraph' w:styleId='BHKStandard'><w:name w:val='BHK_Standard'/></w:style>`
        + '</w:styles>';

      const catalog = parseStylesXml(xml);
      const assembler = new DocumentAssembler(catalog);
      const paragraph = assembler.newParagraph();

      expect(catalog.paragraphStyles).toEqual([{ id: 'BHKStandard', name: 'BHK_Standard', isDefault: false }]);
      expect(assembler.applyStyle(paragraph)?.id).toBe('BHKStandard');
      expect(paragraph.style).toBe('BHKStandard');
    });

    it('should not let a self-closing style swallow the next one', () => {
      const xml = `<w:styles xmlns:w="${W_NS}">`
        + '<w:style w:type="character" w:styleId="Empty"/>'
        + '<w:style w:type="paragraph" w:styleId="BHKStandard"><w:name w:val="BHK_Standard"/></w:style>'
        + '</w:styles>';

      expect(parseStylesXml(xml).paragraphStyles).toEqual([
        { id: 'BHKStandard', name: 'BHK_Standard', isDefault: false }
      ]);
    });

    it('should decode numeric character references', () => {
      const xml = createStylesXml([{ id: 'Heading1', name: '&#220;berschrift 1' }, { id: 'Hex', name: '&#x42;HK' }]);

      expect(parseStylesXml(xml).paragraphStyles.map(style => style.name)).toEqual(['Überschrift 1', 'BHK']);
    });

    it('should read w:default="true" as the default style', () => {
      const xml = `<w:styles xmlns:w="${W_NS}">`
        + '<w:style w:type="paragraph" w:default="true" w:styleId="Standard"><w:name w:val="Normal"/></w:style>'
        + '</w:styles>';

      expect(parseStylesXml(xml).paragraphStyles[0].isDefault).toBe(true);
    });

    it('should throw on malformed XML', () => {
      expect(() => parseStylesXml(`<w:styles xmlns:w="${W_NS}"><w:style></w:styles>`)).toThrow(/^Malformed styles\.xml/);
    });
  });

  describe('parseTemplateBuffer', () => {
    it('should read styles from a DOCX archive', async () => {
      const buffer = await createTemplateBuffer([{ id: 'BHKStandard', name: 'BHK_Standard' }]);

      const catalog = await parseTemplateBuffer(buffer, 'template.docx');

      expect(catalog.paragraphStyles).toEqual([{ id: 'BHKStandard', name: 'BHK_Standard', isDefault: false }]);
      expect(catalog.stylesXml).toContain('w:styleId="BHKStandard"');
    });

    it('should find a custom style in a document written by the docx library', async () => {
      const catalog = await parseTemplateBuffer(await createDocxLibraryTemplate(), 'template.docx');

      expect(findParagraphStyle(catalog, 'BHK_Standard')?.id).toBe('BHKStandard');
    });

    it('should reject data that is not a zip archive', async () => {
      const parsing = parseTemplateBuffer(Buffer.from('not a zip'), 'broken.docx');

      await expect(parsing).rejects.toBeInstanceOf(TemplateError);
      await expect(parsing).rejects.toThrow(/^Template is not a valid DOCX archive/);
    });

    it('should reject archives with an unparseable styles part', async () => {
      const zip = new JSZip();
      zip.file('word/styles.xml', `<w:styles xmlns:w="${W_NS}"><w:style></w:styles>`);
      const buffer = await zip.generateAsync({ type: 'nodebuffer' });

      await expect(parseTemplateBuffer(buffer, 'malformed.docx')).rejects.toMatchObject({
        name: 'TemplateError',
        templatePath: 'malformed.docx'
      });
    });

    it('should reject archives without a styles part', async () => {
      const zip = new JSZip();
      zip.file('word/document.xml', '<w:document/>');
      const buffer = await zip.generateAsync({ type: 'nodebuffer' });

      await expect(parseTemplateBuffer(buffer, 'nostyles.docx'))
        .rejects.toThrow('Invalid DOCX template: missing word/styles.xml');
    });
  });

  describe('loadStyleTemplate', () => {
    let workDir: string;

    beforeEach(async () => {
      workDir = await mkdtemp(join(tmpdir(), 'template-parser-'));
    });

    afterEach(async () => {
      await rm(workDir, { recursive: true, force: true });
    });

    it('should return null when the template does not exist', async () => {
      expect(await loadStyleTemplate(join(workDir, 'missing.docx'))).toBeNull();
    });

    it('should load the catalog of a template on disk', async () => {
      const templatePath = join(workDir, 'bhk.docx');
      await writeFile(templatePath, await createTemplateBuffer([
        { id: 'Normal', name: 'Normal', isDefault: true },
        { id: 'BHKStandard', name: 'BHK_Standard' }
      ]));

      const catalog = await loadStyleTemplate(templatePath);

      expect(catalog?.paragraphStyles.map(style => style.id)).toEqual(['Normal', 'BHKStandard']);
    });

    it('should raise TemplateError for a corrupt template', async () => {
      const templatePath = join(workDir, 'corrupt.docx');
      await writeFile(templatePath, 'plain text');

      await expect(loadStyleTemplate(templatePath)).rejects.toMatchObject({
        name: 'TemplateError',
        templatePath
      });
    });
  });
});
