import type { Presentation } from "@slidesmith/schemas";
import { PresentationSchema } from "@slidesmith/schemas";
import type { ListPresentationsOptions, PresentationStore } from "@slidesmith/core";
import type { SqliteDatabase } from "../database.js";

interface PresentationRow {
  id: string;
  topic: string;
  num_slides: number;
  slides: string;
  custom_content: string | null;
  theme: string;
  font: string;
  colors: string;
  aspect_ratio: string;
  custom_width: number | null;
  custom_height: number | null;
  created_at: string;
  updated_at: string;
}

const COLUMNS = `id, topic, num_slides, slides, custom_content, theme, font, colors,
  aspect_ratio, custom_width, custom_height, created_at, updated_at`;

const NEWEST_FIRST = "ORDER BY created_at DESC, rowid DESC";

/** Escapes LIKE wildcards so user input matches literally. */
function likePattern(term: string): string {
  return `%${term.toLowerCase().replace(/[\\%_]/g, (c) => `\\${c}`)}%`;
}

export class SqlitePresentationStore implements PresentationStore {
  constructor(private db: SqliteDatabase) {}

  async save(presentation: Presentation): Promise<void> {
    this.db
      .prepare(
        `INSERT INTO presentations (${COLUMNS})
         VALUES (@id, @topic, @numSlides, @slides, @customContent, @theme, @font, @colors,
                 @aspectRatio, @customWidth, @customHeight, @createdAt, @updatedAt)
         ON CONFLICT(id) DO UPDATE SET
           topic = excluded.topic,
           num_slides = excluded.num_slides,
           slides = excluded.slides,
           custom_content = excluded.custom_content,
           theme = excluded.theme,
           font = excluded.font,
           colors = excluded.colors,
           aspect_ratio = excluded.aspect_ratio,
           custom_width = excluded.custom_width,
           custom_height = excluded.custom_height,
           updated_at = excluded.updated_at`,
      )
      .run({
        id: presentation.id,
        topic: presentation.topic,
        numSlides: presentation.numSlides,
        slides: JSON.stringify(presentation.slides),
        customContent: presentation.customContent,
        theme: presentation.theme,
        font: presentation.font,
        colors: JSON.stringify(presentation.colors),
        aspectRatio: presentation.aspectRatio,
        customWidth: presentation.customWidth,
        customHeight: presentation.customHeight,
        createdAt: presentation.createdAt,
        updatedAt: presentation.updatedAt,
      });
  }

  async getById(id: string): Promise<Presentation | null> {
    const row = this.db
      .prepare<[string], PresentationRow>(`SELECT ${COLUMNS} FROM presentations WHERE id = ?`)
      .get(id);
    return row ? toPresentation(row) : null;
  }

  async delete(id: string): Promise<boolean> {
    const result = this.db.prepare<[string]>("DELETE FROM presentations WHERE id = ?").run(id);
    return result.changes > 0;
  }

  async list(options: ListPresentationsOptions = {}): Promise<Presentation[]> {
    // SQLite treats a negative LIMIT as "no limit".
    const rows = this.db
      .prepare<[number, number], PresentationRow>(
        `SELECT ${COLUMNS} FROM presentations ${NEWEST_FIRST} LIMIT ? OFFSET ?`,
      )
      .all(options.limit ?? -1, options.offset ?? 0);
    return rows.map(toPresentation);
  }

  async search(topic: string): Promise<Presentation[]> {
    const rows = this.db
      .prepare<[string], PresentationRow>(
        `SELECT ${COLUMNS} FROM presentations WHERE lower(topic) LIKE ? ESCAPE '\\' ${NEWEST_FIRST}`,
      )
      .all(likePattern(topic));
    return rows.map(toPresentation);
  }

  async count(): Promise<number> {
    const row = this.db.prepare<[], { total: number }>("SELECT COUNT(*) AS total FROM presentations").get();
    return row?.total ?? 0;
  }
}

function toPresentation(row: PresentationRow): Presentation {
  return PresentationSchema.parse({
    id: row.id,
    topic: row.topic,
    numSlides: row.num_slides,
    slides: JSON.parse(row.slides),
    customContent: row.custom_content,
    theme: row.theme,
    font: row.font,
    colors: JSON.parse(row.colors),
    aspectRatio: row.aspect_ratio,
    customWidth: row.custom_width,
    customHeight: row.custom_height,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  });
}
