import { describe, test, expect, beforeEach } from "vitest";
import { ENCRYPTION_BINDINGS } from "../../../src/constants.ts";
import { parseEncryption, parseEncryptionData } from "../../../src/epub/encryption.ts";
import { InMemoryFetcher } from "../../../src/fetcher/memory.ts";
import { parseXml } from "../../../src/xml/document.ts";
import { mockLogger, runTest } from "../../helpers/layers.ts";

const ENCRYPTION_XML = `<?xml version="1.0" encoding="UTF-8"?>
<encryption xmlns="urn:oasis:names:tc:opendocument:xmlns:container"
    xmlns:enc="http://www.w3.org/2001/04/xmlenc#"
    xmlns:ds="http://www.w3.org/2000/09/xmldsig#"
    xmlns:comp="http://www.idpf.org/2016/encryption#compression">
  <enc:EncryptedData>
    <enc:EncryptionMethod Algorithm="http://www.idpf.org/2008/embedding"/>
    <enc:CipherData><enc:CipherReference URI="OEBPS/fonts/font.otf"/></enc:CipherData>
  </enc:EncryptedData>
  <enc:EncryptedData>
    <enc:EncryptionMethod Algorithm="http://www.w3.org/2001/04/xmlenc#aes256-cbc"/>
    <ds:KeyInfo>
      <ds:RetrievalMethod URI="license.lcpl#/encryption/content_key" Type="http://readium.org/2014/01/lcp#EncryptedContentKey"/>
    </ds:KeyInfo>
    <enc:CipherData><enc:CipherReference URI="OEBPS/chapter%201.xhtml"/></enc:CipherData>
    <enc:EncryptionProperties>
      <enc:EncryptionProperty>
        <comp:Compression Method="8" OriginalLength="13542"/>
      </enc:EncryptionProperty>
    </enc:EncryptionProperties>
  </enc:EncryptedData>
  <enc:EncryptedData>
    <enc:CipherData><enc:CipherReference URI="OEBPS/no-algorithm.xhtml"/></enc:CipherData>
  </enc:EncryptedData>
</encryption>`;

describe("epub/encryption", () => {
  beforeEach(() => {
    mockLogger.reset();
  });

  describe("parseEncryption", () => {
    test("keys one record per encrypted resource", () => {
      expect(parseEncryption(parseXml(ENCRYPTION_XML, ENCRYPTION_BINDINGS))).toEqual({
        "OEBPS/fonts/font.otf": { algorithm: "http://www.idpf.org/2008/embedding" },
        "OEBPS/chapter 1.xhtml": {
          algorithm: "http://www.w3.org/2001/04/xmlenc#aes256-cbc",
          scheme: "http://readium.org/2014/01/lcp",
          compression: "deflate",
          originalLength: 13542,
        },
      });
    });

    test("maps an unknown compression method to no compression field", () => {
      const xml = `<encryption xmlns:enc="http://www.w3.org/2001/04/xmlenc#" xmlns:comp="http://www.idpf.org/2016/encryption#compression">
        <enc:EncryptedData>
          <enc:EncryptionMethod Algorithm="urn:example:alg"/>
          <enc:CipherData><enc:CipherReference URI="a.xhtml"/></enc:CipherData>
          <enc:EncryptionProperties><enc:EncryptionProperty><comp:Compression Method="0" OriginalLength="10"/></enc:EncryptionProperty></enc:EncryptionProperties>
        </enc:EncryptedData>
        <enc:EncryptedData>
          <enc:EncryptionMethod Algorithm="urn:example:alg"/>
          <enc:CipherData><enc:CipherReference URI="b.xhtml"/></enc:CipherData>
          <enc:EncryptionProperties><enc:EncryptionProperty><comp:Compression Method="12"/></enc:EncryptionProperty></enc:EncryptionProperties>
        </enc:EncryptedData>
      </encryption>`;

      expect(parseEncryption(parseXml(xml, ENCRYPTION_BINDINGS))).toEqual({
        "a.xhtml": { algorithm: "urn:example:alg", compression: "none", originalLength: 10 },
        "b.xhtml": { algorithm: "urn:example:alg" },
      });
    });
  });

  describe("parseEncryptionData", () => {
    test("reads META-INF/encryption.xml", async () => {
      const fetcher = new InMemoryFetcher({ "META-INF/encryption.xml": ENCRYPTION_XML });

      const records = await runTest(parseEncryptionData(fetcher));

      expect(Object.keys(records)).toEqual(["OEBPS/fonts/font.otf", "OEBPS/chapter 1.xhtml"]);
    });

    test("returns an empty map when the descriptor is missing", async () => {
      const records = await runTest(parseEncryptionData(new InMemoryFetcher({})));

      expect(records).toEqual({});
      expect(mockLogger.debugCalls.map((call) => call.msg)).toEqual(["No usable encryption descriptor"]);
    });

    test("returns an empty map when the descriptor is malformed", async () => {
      const fetcher = new InMemoryFetcher({ "META-INF/encryption.xml": "<encryption><enc:EncryptedData></encryption>" });

      expect(await runTest(parseEncryptionData(fetcher))).toEqual({});
    });
  });
});
