import { ImageTypeSchema } from '@imageshelf/api-contracts';
import { timedQuery, type DbClient } from '../lib/db.js';
import type { Image, ImageRepository, ImageUpdateFields } from '../services/images/types.js';
import type { ImageRow } from './types.js';

const COLUMNS = 'id, name, path, url, type, uploaded_to, created_by, updated_by, created_at, updated_at';

const UPDATE_COLUMNS = [
  ['name', 'name'],
  ['uploadedTo', 'uploaded_to'],
  ['createdBy', 'created_by'],
  ['updatedBy', 'updated_by'],
] as const satisfies ReadonlyArray<readonly [keyof ImageUpdateFields, string]>;

export function mapImageRow(row: ImageRow): Image {
  return {
    id: row.id,
    name: row.name,
    path: row.path,
    url: row.url,
    type: ImageTypeSchema.parse(row.type),
    uploadedTo: row.uploaded_to,
    createdBy: row.created_by,
    updatedBy: row.updated_by,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function createImageRepository(client: DbClient): ImageRepository {
  return {
    async create(fields) {
      const res = await timedQuery<ImageRow>(
        client,
        `INSERT INTO images (name, path, url, type, uploaded_to, created_by, updated_by)
         VALUES ($1, $2, $3, $4, $5, $6, $7)
         RETURNING ${COLUMNS}`,
        [fields.name, fields.path, fields.url, fields.type, fields.uploadedTo, fields.createdBy, fields.updatedBy]
      );
      const row = res.rows[0];
      if (!row) throw new Error('Image insert returned no row');
      return mapImageRow(row);
    },

    async update(image, fields) {
      const sets: string[] = [];
      const values: unknown[] = [];
      for (const [key, column] of UPDATE_COLUMNS) {
        const value = fields[key];
        if (value === undefined) continue;
        values.push(value);
        sets.push(`${column} = $${values.length}`);
      }
      if (sets.length === 0) return image;

      values.push(image.id);
      const res = await timedQuery<ImageRow>(
        client,
        `UPDATE images SET ${sets.join(', ')}, updated_at = now() WHERE id = $${values.length} RETURNING ${COLUMNS}`,
        values
      );
      const row = res.rows[0];
      if (!row) throw new Error(`Image ${image.id} no longer exists`);
      return mapImageRow(row);
    },

    async delete(image) {
      await timedQuery(client, 'DELETE FROM images WHERE id = $1', [image.id]);
    },

    async findById(id) {
      const res = await timedQuery<ImageRow>(client, `SELECT ${COLUMNS} FROM images WHERE id = $1`, [id]);
      const row = res.rows[0];
      return row ? mapImageRow(row) : null;
    },

    async *chunkByTypes(types, size) {
      if (types.length === 0) return;
      // Keyset pagination: rows deleted by the consumer between batches never shift the window.
      let lastId = 0;
      for (;;) {
        const res = await timedQuery<ImageRow>(
          client,
          `SELECT ${COLUMNS} FROM images
           WHERE type = ANY($1::text[]) AND id > $2
           ORDER BY id ASC
           LIMIT $3`,
          [types, lastId, size]
        );
        if (res.rows.length === 0) return;
        const batch = res.rows.map(mapImageRow);
        lastId = batch[batch.length - 1]?.id ?? lastId;
        yield batch;
        if (res.rows.length < size) return;
      }
    },
  };
}
