export const CONTAINER_PATH = "META-INF/container.xml";
export const ENCRYPTION_PATH = "META-INF/encryption.xml";

/** Vendor display-options documents, in the order they are tried. */
export const DISPLAY_OPTIONS_PATHS = [
  "META-INF/com.apple.ibooks.display-options.xml",
  "META-INF/com.kobobooks.display-options.xml",
] as const;

export const NAMESPACES = {
  container: "urn:oasis:names:tc:opendocument:xmlns:container",
  opf: "http://www.idpf.org/2007/opf",
  dc: "http://purl.org/dc/elements/1.1/",
  dcterms: "http://purl.org/dc/terms/",
  rendition: "http://www.idpf.org/2013/rendition",
  ncx: "http://www.daisy.org/z3986/2005/ncx/",
  xhtml: "http://www.w3.org/1999/xhtml",
  ops: "http://www.idpf.org/2007/ops",
  smil: "http://www.w3.org/ns/SMIL",
  enc: "http://www.w3.org/2001/04/xmlenc#",
  sig: "http://www.w3.org/2000/09/xmldsig#",
  comp: "http://www.idpf.org/2016/encryption#compression",
} as const;

export type NamespaceBindings = Readonly<Record<string, string>>;

export const CONTAINER_BINDINGS: NamespaceBindings = {
  [NAMESPACES.container]: "cn",
};

export const PACKAGE_BINDINGS: NamespaceBindings = {
  [NAMESPACES.opf]: "opf",
  [NAMESPACES.dc]: "dc",
  [NAMESPACES.dcterms]: "dcterms",
  [NAMESPACES.rendition]: "rendition",
};

export const NCX_BINDINGS: NamespaceBindings = {
  [NAMESPACES.ncx]: "ncx",
};

export const NAV_DOC_BINDINGS: NamespaceBindings = {
  [NAMESPACES.xhtml]: "html",
  [NAMESPACES.ops]: "epub",
};

export const SMIL_BINDINGS: NamespaceBindings = {
  [NAMESPACES.smil]: "smil",
  [NAMESPACES.ops]: "epub",
};

export const ENCRYPTION_BINDINGS: NamespaceBindings = {
  [NAMESPACES.enc]: "enc",
  [NAMESPACES.sig]: "ds",
  [NAMESPACES.comp]: "comp",
};

export const LCP_SCHEME = "http://readium.org/2014/01/lcp";
export const LCP_KEY_RETRIEVAL_URI = "license.lcpl#/encryption/content_key";

export const ALGORITHM_IDPF_OBFUSCATION = "http://www.idpf.org/2008/embedding";
export const ALGORITHM_ADOBE_OBFUSCATION = "http://ns.adobe.com/pdf/enc#RC";

export const WEBPUB_CONTEXT = "https://readium.org/webpub-manifest/context.jsonld";

export const PROFILES = {
  epub: "https://readium.org/webpub-manifest/profiles/epub",
  divina: "https://readium.org/webpub-manifest/profiles/divina",
} as const;

/** Extensions tolerated beside bitmaps in a plain image archive. */
export const IMAGE_ARCHIVE_AUXILIARY_EXTENSIONS: ReadonlySet<string> = new Set(["acbf", "xml", "txt", "json"]);

export const DEFAULT_POSITIONS_PAGE_LENGTH = 1024;
