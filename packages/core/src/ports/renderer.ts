import { type WorksheetMeta, type WorksheetRecord } from '../entities/worksheet';
import { type RenderFormat } from '../errors';

export interface RenderedDocument {
  content   : string | Buffer;
  mimeType  : string;
  extension : string;
}

export interface WorksheetRenderer {
  readonly format: RenderFormat;
  /** Rejects with `RenderingFailureError`; the record itself stays valid and re-renderable. */
  render(record: WorksheetRecord, meta: WorksheetMeta): Promise<RenderedDocument>;
}
