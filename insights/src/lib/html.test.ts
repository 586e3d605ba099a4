import assert from "node:assert/strict";
import test from "node:test";
import { load } from "cheerio";
import { textOf, visibleStrings } from "./html";

test("visibleStrings trims text nodes and skips scripts and styles", () => {
  const $ = load(`
    <html><head><title> Shop </title><style>body { color: red }</style></head>
    <body>
      <h1>Returns</h1>
      <script>window.track = true;</script>
      <p>  Send it back within 30 days. </p>
    </body></html>`);

  assert.deepEqual(visibleStrings($.root().toArray()), ["Shop", "Returns", "Send it back within 30 days."]);
});

test("textOf joins nested text with single spaces", () => {
  const $ = load(`<div id="about"><h2>Our story</h2>\n<p>Made   in <b>small</b> batches.</p></div>`);

  assert.equal(textOf($("#about")), "Our story Made in small batches.");
});
