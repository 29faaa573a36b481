/**
 * Static stylesheet and inline scripts of the rendered page
 */

/**
 * Serialize a value for use inside an inline <script>
 */
function scriptLiteral(value: string): string {
  return JSON.stringify(value).replace(/</g, "\\u003c");
}

export const PAGE_STYLES = `body {
  font-family: system-ui, -apple-system, Segoe UI, Roboto, Arial, sans-serif;
  margin: 24px;
}
.toolbar {
  display: flex;
  align-items: center;
  gap: 12px;
  margin-bottom: 16px;
}
.toolbar input {
  flex: 1;
  max-width: 420px;
  padding: 8px 12px;
  border: 1px solid #d0d0d0;
  border-radius: 10px;
  font: inherit;
}
.count {
  color: #666;
  font-size: 14px;
}
.grid {
  display: grid;
  grid-template-columns: repeat(auto-fill, minmax(240px, 1fr));
  gap: 16px;
}
.card {
  display: block;
  border: 1px solid #e6e6e6;
  border-radius: 14px;
  padding: 12px;
  text-decoration: none;
  color: inherit;
  background: #fff;
}
.card[hidden] {
  display: none;
}
.card:hover {
  box-shadow: 0 6px 20px rgba(0, 0, 0, .06);
}
.logoWrap {
  height: 120px;
  display: flex;
  align-items: start;
  justify-content: start;
  margin-bottom: 10px;
}
img {
  max-width: 100%;
  max-height: 120px;
  object-fit: contain;
}
.name {
  font-weight: 700;
  margin-bottom: 4px;
}
.meta {
  color: #666;
  font-size: 14px;
}
.empty {
  color: #666;
}
footer {
  margin-top: 24px;
  font-size: 13px;
  color: #666;
}`;

/**
 * Fill the "last updated" slot in the visitor's browser, so the file
 * itself stays identical between runs on the same data
 */
export function timestampScript(locale: string): string {
  return `document.getElementById("ts").textContent =
  new Date().toLocaleString(${scriptLiteral(locale)});`;
}

/**
 * Filter cards by substring of their data-search attribute
 */
export function searchScript(): string {
  return `(function () {
  var input = document.getElementById("search");
  var cards = Array.prototype.slice.call(document.querySelectorAll("#grid .card"));
  var visibleCount = document.getElementById("visibleCount");
  var empty = document.getElementById("empty");

  function applyFilter() {
    var query = input.value.trim().toLowerCase();
    var visible = 0;
    cards.forEach(function (card) {
      var haystack = card.getAttribute("data-search") || "";
      var match = !query || haystack.indexOf(query) !== -1;
      card.hidden = !match;
      if (match) visible++;
    });
    visibleCount.textContent = String(visible);
    empty.hidden = visible !== 0;
  }

  input.addEventListener("input", applyFilter);
})();`;
}

/**
 * Report the document height to the embedding page on every layout change
 */
export function heightScript(messageType: string): string {
  return `(function () {
  function sendHeight() {
    var d = document.documentElement;
    var b = document.body;
    var h = Math.max(
      d.scrollHeight, d.offsetHeight, d.clientHeight,
      b ? b.scrollHeight : 0,
      b ? b.offsetHeight : 0
    );
    if (window.parent && window.parent !== window) {
      window.parent.postMessage({ type: ${scriptLiteral(messageType)}, height: h }, "*");
    }
  }

  window.addEventListener("load", sendHeight);
  window.addEventListener("resize", function () { setTimeout(sendHeight, 50); });

  var mo = new MutationObserver(function () { setTimeout(sendHeight, 50); });
  mo.observe(document.documentElement, { childList: true, subtree: true, attributes: true });

  if ("ResizeObserver" in window) {
    new ResizeObserver(function () { setTimeout(sendHeight, 50); })
      .observe(document.documentElement);
  }

  setTimeout(sendHeight, 300);
  setTimeout(sendHeight, 1200);
})();`;
}
