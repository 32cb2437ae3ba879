// Markup is fixed by the provider's embed guide; only {url} changes.

export const IFRAME_TEMPLATE = [
  "",
  '<iframe id="tipButtonFrame" scrolling="no" frameborder="0"',
  '    style="border:none; overflow:hidden; height:22px;"',
  '    allowTransparency="true" src="{url}">',
  "</iframe>",
  "",
].join("\n");

// Needs jQuery (or a compatible $ with ready/load) on the host page.
export const DIV_TEMPLATE = [
  "",
  '<div id="tipButtonDiv" class="tipButtonDiv"></div>',
  '<div id="tipButtonPopup" class="tipButtonPopup"></div>',
  "<script>",
  "    $(document).ready(function() {",
  '        $("#tipButtonDiv").load("{url}");',
  "    });",
  "</script>",
  "",
].join("\n");

export function renderTemplate(template: string, url: string): string {
  return template.replace("{url}", () => url);
}
