import { mkdir, writeFile } from "node:fs/promises";
import * as path from "node:path";
import JSZip from "jszip";

type BookFile = {
  id: string;
  href: string;
  mediaType: string;
  content: string;
};

type Section = "metadata" | "manifest" | "spine" | "guide";

/**
 * Builds small EPUB archives for tests.
 */
class TestBook {
  private items: BookFile[] = [];
  private spine: string[] = [];
  private sections: Section[] = ["metadata", "manifest", "spine"];
  private extraFiles = new Map<string, string>();
  private containerXml: string | null;
  private opf: string | null = null;

  /**
   * @param packageDir - Directory of the package descriptor inside the archive
   */
  constructor(private readonly packageDir = "OEBPS") {
    this.containerXml = `<?xml version="1.0" encoding="UTF-8"?>
<container version="1.0" xmlns="urn:oasis:names:tc:opendocument:xmlns:container">
  <rootfiles>
    <rootfile full-path="${this.packagePath}" media-type="application/oebps-package+xml"/>
  </rootfiles>
</container>`;
  }

  get packagePath(): string {
    return this.packageDir ? `${this.packageDir}/content.opf` : "content.opf";
  }

  // escape bare & and XML-special chars
  private escapeXml(str: string): string {
    return str
      .replace(/&(?!([A-Za-z]+|#\d+);)/g, "&amp;")
      .replace(/</g, "&lt;")
      .replace(/>/g, "&gt;")
      .replace(/"/g, "&quot;");
  }

  /**
   * Adds a content document to the manifest and, unless `inSpine` is false,
   * to the end of the spine. `body` is placed inside <body>; pass a string
   * starting with "<!" or "<html" to supply the whole document.
   */
  addChapter(id: string, body: string, href = `${id}.xhtml`, inSpine = true): this {
    const content =
      body.startsWith("<!") || body.startsWith("<html") || body.startsWith("<?xml")
        ? body
        : `<?xml version="1.0" encoding="UTF-8"?>
<!DOCTYPE html>
<html xmlns="http://www.w3.org/1999/xhtml"><head><title>${id}</title></head><body>${body}</body></html>`;
    this.items.push({ id, href, mediaType: "application/xhtml+xml", content });
    if (inSpine) this.spine.push(id);
    return this;
  }

  addSpineRef(idref: string): this {
    this.spine.push(idref);
    return this;
  }

  setSections(sections: Section[]): this {
    this.sections = sections;
    return this;
  }

  setContainer(xml: string | null): this {
    this.containerXml = xml;
    return this;
  }

  /** Replaces the generated package descriptor. */
  setPackage(opf: string): this {
    this.opf = opf;
    return this;
  }

  /** Adds a file at an archive path, outside the manifest. */
  addFile(entryName: string, content: string): this {
    this.extraFiles.set(entryName, content);
    return this;
  }

  private generateOPF(): string {
    const render: Record<Section, () => string> = {
      metadata: () => `<metadata xmlns:dc="http://purl.org/dc/elements/1.1/">
    <dc:identifier id="book-id">urn:uuid:00000000-0000-4000-8000-000000000000</dc:identifier>
    <dc:title>Test Book</dc:title>
    <dc:language>en</dc:language>
  </metadata>`,
      manifest: () => `<manifest>
    ${this.items
      .map(
        (item) =>
          `<item id="${this.escapeXml(item.id)}" href="${this.escapeXml(item.href)}" media-type="${item.mediaType}"/>`,
      )
      .join("\n    ")}
  </manifest>`,
      spine: () => `<spine>
    ${this.spine.map((id) => `<itemref idref="${this.escapeXml(id)}"/>`).join("\n    ")}
  </spine>`,
      guide: () => `<guide>
    <reference type="text" title="Start" href="${this.items[0]?.href ?? ""}"/>
  </guide>`,
    };

    return `<?xml version="1.0" encoding="UTF-8"?>
<package xmlns="http://www.idpf.org/2007/opf" version="3.0" unique-identifier="book-id">
  ${this.sections.map((section) => render[section]()).join("\n  ")}
</package>`;
  }

  /** Archive entries in the order they are written, mimetype first. */
  private entries(): Array<[string, string]> {
    const entries: Array<[string, string]> = [["mimetype", "application/epub+zip"]];
    if (this.containerXml !== null) {
      entries.push(["META-INF/container.xml", this.containerXml]);
    }
    entries.push([this.packagePath, this.opf ?? this.generateOPF()]);
    const base = this.packageDir ? `${this.packageDir}/` : "";
    for (const item of this.items) {
      entries.push([`${base}${decodeURIComponent(item.href)}`, item.content]);
    }
    entries.push(...this.extraFiles);
    return entries;
  }

  generate(): JSZip {
    const zip = new JSZip();
    for (const [name, content] of this.entries()) {
      // The mimetype file must be stored uncompressed
      zip.file(name, content, name === "mimetype" ? { compression: "STORE" } : undefined);
    }
    return zip;
  }

  /**
   * Writes the archive to `dir/fileName` and returns its path.
   */
  async save(dir: string, fileName = "book.epub"): Promise<string> {
    const content = await this.generate().generateAsync({ type: "nodebuffer" });
    const target = path.join(dir, fileName);
    await writeFile(target, content);
    return target;
  }

  /**
   * Writes the entries as plain files under `dir`, as if already extracted.
   */
  async writeTo(dir: string): Promise<string> {
    for (const [name, content] of this.entries()) {
      const target = path.join(dir, ...name.split("/"));
      await mkdir(path.dirname(target), { recursive: true });
      await writeFile(target, content);
    }
    return dir;
  }
}

export default TestBook;
