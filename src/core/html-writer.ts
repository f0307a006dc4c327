// core/html-writer.ts
// Assemble the final printable HTML page for a render request

import type { Assets, RenderRequest } from '../types/index.js';

export interface HtmlOptions {
  title?: string;
  lang?: string;
}

const DEFAULT_CSS = `
  body {
    font-family: "Marianne", Arial, Helvetica, sans-serif;
    line-height: 1.6;
    color: #000000;
    margin: 2cm;
  }

  p {
    font-size: 11pt;
    line-height: 1.4;
    margin-top: 0;
    margin-bottom: 6pt;
  }

  h1 { font-size: 24pt; font-weight: 700; margin: 12pt 0 6pt; }
  h2 { font-size: 18pt; font-weight: 700; margin: 10pt 0 5pt; }
  h3 { font-size: 14pt; font-weight: 700; margin: 8pt 0 4pt; }

  ul, ol {
    font-size: 11pt;
    margin-bottom: 6pt;
    padding-left: 20pt;
    line-height: 1.4;
  }

  li { margin-bottom: 3pt; }

  table {
    width: 100%;
    border-collapse: collapse;
    margin-bottom: 10pt;
    font-size: 11pt;
  }

  th, td {
    border: 1pt solid #ccc;
    padding: 5pt;
    text-align: left;
  }

  th {
    background-color: #f0f0f0;
    font-weight: 700;
  }

  /* Rich-text editor classes */
  .ql-size-8pt { font-size: 8pt !important; color: #666666 !important; }
  .ql-size-18pt { font-size: 18pt; }
  .ql-size-24pt { font-size: 24pt; }
  .ql-align-left { text-align: left !important; }
  .ql-align-center { text-align: center !important; }
  .ql-align-right { text-align: right !important; }
  .ql-align-justify { text-align: justify !important; }

  .footer-style {
    font-size: 8pt !important;
    color: #666666 !important;
    line-height: 1.3 !important;
  }

  .header {
    display: table;
    width: 100%;
    margin-bottom: 20pt;
  }

  .header-cell {
    display: table-cell;
    width: 50%;
    vertical-align: top;
  }

  .header-service {
    text-align: right;
    font-size: 10pt;
    line-height: 1.3;
  }

  .header-rule {
    border: none;
    border-top: 2pt solid #000091;
    margin: 15pt 0 20pt 0;
  }

  .logo { width: 80pt; height: auto; display: block; }

  .signature-container {
    margin-top: 30pt;
    text-align: right;
  }

  .signature { width: 100pt; height: auto; display: inline-block; }

  @page {
    size: A4;
    margin: 0;
  }
`;

/**
 * Slots the template author placed for assets. Escaped row values cannot
 * contain '<', so a marker in the body always comes from the template.
 */
export const ASSET_MARKERS = {
  logo: '<!--docmerge:logo-->',
  signature: '<!--docmerge:signature-->',
  service_name: '<!--docmerge:service_name-->',
} as const;

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#039;');
}

/**
 * Escape a value for a CSS context so it cannot close the <style> element
 */
export function escapeCss(text: string): string {
  return text.replace(/</g, '\\3C ');
}

/**
 * Turn the reserved placeholders of template markup into asset markers
 */
export function markAssetSlots(markup: string): string {
  return markup
    .split('{{logo}}').join(ASSET_MARKERS.logo)
    .split('{{signature}}').join(ASSET_MARKERS.signature)
    .split('{{service_name}}').join(ASSET_MARKERS.service_name);
}

/**
 * Drop inline colour styles the rich-text editor leaves behind
 */
export function cleanEditorMarkup(markup: string): string {
  return markup
    .replace(/\s*style="color:\s*rgb\([^)]+\);?"/g, '')
    .replace(/\s*style=""/g, '');
}

export function logoHtml(dataUri: string): string {
  return `<img src="${escapeHtml(dataUri)}" alt="Logo" class="logo">`;
}

export function signatureHtml(dataUri: string): string {
  return `<img src="${escapeHtml(dataUri)}" alt="Signature" class="signature">`;
}

export function serviceNameHtml(serviceName: string): string {
  return serviceName
    .replace(/\r\n/g, '\n')
    .split('\n')
    .map(escapeHtml)
    .join('<br>');
}

/**
 * Header with the logo on the left and the service name on the right.
 * Either part is skipped when the body already places it inline.
 */
function renderHeader(assets: Assets, skipLogo: boolean, skipService: boolean): string {
  const logo = !skipLogo && assets.logo ? logoHtml(assets.logo) : '';
  const service = !skipService && assets.serviceName
    ? `<div class="header-service">${serviceNameHtml(assets.serviceName)}</div>`
    : '';

  if (!logo && !service) return '';

  return `  <div class="header">
    <div class="header-cell">${logo}</div>
    <div class="header-cell">${service}</div>
  </div>
  <hr class="header-rule">`;
}

function renderSignature(assets: Assets): string {
  if (!assets.signature) return '';
  return `<div class="signature-container">${signatureHtml(assets.signature)}</div>`;
}

/**
 * Fill the asset markers. Absent assets leave nothing behind.
 */
export function placeAssets(markup: string, assets: Assets): string {
  return markup
    .split(ASSET_MARKERS.logo).join(assets.logo ? logoHtml(assets.logo) : '')
    .split(ASSET_MARKERS.signature).join(assets.signature ? signatureHtml(assets.signature) : '')
    .split(ASSET_MARKERS.service_name).join(assets.serviceName ? serviceNameHtml(assets.serviceName) : '');
}

export function composeDocument(request: RenderRequest, options?: HtmlOptions): string {
  const title = options?.title ?? request.filename;
  const lang = options?.lang ?? 'fr';
  const { assets } = request;

  const inlineLogo = request.bodyMarkup.includes(ASSET_MARKERS.logo);
  const inlineSignature = request.bodyMarkup.includes(ASSET_MARKERS.signature);
  const inlineService = request.bodyMarkup.includes(ASSET_MARKERS.service_name);

  const body = placeAssets(cleanEditorMarkup(request.bodyMarkup), assets);

  return `<!DOCTYPE html>
<html lang="${escapeHtml(lang)}">
<head>
  <meta charset="UTF-8">
  <title>${escapeHtml(title)}</title>
  <style>
${DEFAULT_CSS}
${request.css}
  </style>
</head>
<body>
${renderHeader(assets, inlineLogo, inlineService)}
  <div class="contenu">
${body}
${inlineSignature ? '' : renderSignature(assets)}
  </div>
</body>
</html>`;
}
