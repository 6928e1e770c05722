import nunjucks, { type Environment } from 'nunjucks';
import {
    RenderingFailureError,
    type RenderedDocument,
    type WorksheetMeta,
    type WorksheetRecord,
    type WorksheetRenderer
} from '@worksheetbot/core';

export const WORKSHEET_HTML_TEMPLATE = `<!doctype html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <title>{{ record.title }} - WorksheetBot</title>
  <style>
    body { font-family: 'Segoe UI', Tahoma, sans-serif; background: #ffffff; }
    .sheet { border: 6px solid #3b82f6; border-radius: 16px; padding: 16px; }
    h1 { color: #1f2937; }
    h2 { color: #2563eb; }
    .section { margin-top: 12px; padding: 10px; background: #f0f9ff; border-radius: 8px; }
    ul { list-style: none; padding-left: 0; }
    li { margin: 6px 0; }
    .footer { text-align: center; color: #6b7280; font-size: 12px; margin-top: 10px; }
  </style>
</head>
<body>
  <div class="sheet">
    <div class="meta">Date: {{ meta.date }} • Created for {{ meta.child }}</div>
    <h1>{{ record.title }}</h1>
    <div class="section"><h2>Instructions</h2><p>{{ record.instructions }}</p></div>
    {%- for section in record.sections %}
    <div class="section"><h2>{{ section.name }}</h2><ul>
      {%- for question in section.questions %}
      <li>{{ question }}</li>
      {%- endfor %}
    </ul></div>
    {%- endfor %}
    <div class="section"><h2>Parent Tips</h2><p>{{ record.tips }}</p></div>
    <div class="footer">WorksheetBot • Fun learning for {{ meta.child }}</div>
  </div>
</body>
</html>
`;

export class HtmlWorksheetRenderer implements WorksheetRenderer {
    public readonly format = 'html' as const;
    private readonly env: Environment;

    public constructor(private readonly template: string = WORKSHEET_HTML_TEMPLATE) {
        this.env = new nunjucks.Environment(null, { autoescape: true, throwOnUndefined: true });
    }

    public async render(record: WorksheetRecord, meta: WorksheetMeta): Promise<RenderedDocument> {
        try {
            return {
                content: this.env.renderString(this.template, { record, meta }),
                mimeType: 'text/html',
                extension: 'html'
            };
        } catch (error) {
            throw RenderingFailureError.from(this.format, error);
        }
    }
}
