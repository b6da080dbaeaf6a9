/**
 * PostgreSQL Catalog Repository Implementation
 */

import type { Asset, AssetCategory, AssetStatus } from '@loandesk/domain';
import { query, transaction } from '../../db/index.js';
import {
  AssetFilters,
  CreateAssetData,
  CreateCategoryData,
  ICatalogRepository,
  UpdateAssetData,
  UpdateAssetResult,
  UpdateCategoryData,
} from '../interfaces/catalog.repository.js';
import { buildUpdate, likePrefix } from './sql.js';

interface CategoryRow {
  id: string;
  name: string;
}

interface AssetRow {
  id: string;
  category_id: string;
  name: string;
  serial_number: string;
  asset_tag: string | null;
  status: AssetStatus;
  purchase_date: string | null;
  notes: string | null;
}

function mapCategoryRow(row: CategoryRow): AssetCategory {
  return { id: row.id, name: row.name };
}

function mapAssetRow(row: AssetRow): Asset {
  return {
    id: row.id,
    categoryId: row.category_id,
    name: row.name,
    serialNumber: row.serial_number,
    assetTag: row.asset_tag,
    status: row.status,
    purchaseDate: row.purchase_date,
    notes: row.notes,
  };
}

const ASSET_COLUMNS = 'id, category_id, name, serial_number, asset_tag, status, purchase_date, notes';

export class PostgresCatalogRepository implements ICatalogRepository {
  async listCategories(): Promise<AssetCategory[]> {
    const result = await query<CategoryRow>('SELECT id, name FROM asset_category ORDER BY name');
    return result.rows.map(mapCategoryRow);
  }

  async findCategoryById(id: string): Promise<AssetCategory | null> {
    const result = await query<CategoryRow>('SELECT id, name FROM asset_category WHERE id = $1', [id]);
    return result.rows.length > 0 ? mapCategoryRow(result.rows[0]) : null;
  }

  async createCategory(data: CreateCategoryData): Promise<AssetCategory> {
    const result = await query<CategoryRow>(
      'INSERT INTO asset_category (name) VALUES ($1) RETURNING id, name',
      [data.name],
    );
    return mapCategoryRow(result.rows[0]);
  }

  async updateCategory(id: string, data: UpdateCategoryData): Promise<AssetCategory | null> {
    const { sets, values } = buildUpdate({ name: data.name });
    if (sets.length === 0) return this.findCategoryById(id);

    values.push(id);
    const result = await query<CategoryRow>(`
      UPDATE asset_category SET ${sets.join(', ')}
      WHERE id = $${values.length}
      RETURNING id, name
    `, values);
    return result.rows.length > 0 ? mapCategoryRow(result.rows[0]) : null;
  }

  async deleteCategory(id: string): Promise<boolean> {
    const result = await query('DELETE FROM asset_category WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  }

  async listAssets(filters?: AssetFilters): Promise<Asset[]> {
    let sql = `SELECT ${ASSET_COLUMNS} FROM asset WHERE 1 = 1`;
    const params: unknown[] = [];

    if (filters?.name) {
      params.push(likePrefix(filters.name));
      sql += ` AND name ILIKE $${params.length}`;
    }
    if (filters?.serialNumber) {
      params.push(likePrefix(filters.serialNumber));
      sql += ` AND serial_number ILIKE $${params.length}`;
    }
    if (filters?.status && filters.status.length > 0) {
      params.push(filters.status);
      sql += ` AND status = ANY($${params.length}::varchar[])`;
    }
    if (filters?.categoryId) {
      params.push(filters.categoryId);
      sql += ` AND category_id = $${params.length}`;
    }

    sql += ' ORDER BY name, serial_number';

    const result = await query<AssetRow>(sql, params);
    return result.rows.map(mapAssetRow);
  }

  async findAssetById(id: string): Promise<Asset | null> {
    const result = await query<AssetRow>(`SELECT ${ASSET_COLUMNS} FROM asset WHERE id = $1`, [id]);
    return result.rows.length > 0 ? mapAssetRow(result.rows[0]) : null;
  }

  async createAsset(data: CreateAssetData): Promise<Asset> {
    const result = await query<AssetRow>(`
      INSERT INTO asset (category_id, name, serial_number, asset_tag, status, purchase_date, notes)
      VALUES ($1, $2, $3, $4, $5, $6, $7)
      RETURNING ${ASSET_COLUMNS}
    `, [
      data.categoryId,
      data.name,
      data.serialNumber,
      data.assetTag,
      data.status,
      data.purchaseDate,
      data.notes,
    ]);
    return mapAssetRow(result.rows[0]);
  }

  async updateAsset(id: string, data: UpdateAssetData): Promise<UpdateAssetResult> {
    return transaction<UpdateAssetResult>(async (client) => {
      // Same row lock the loan create takes, so a status change and a new loan serialize
      const locked = await client.query<AssetRow>(
        `SELECT ${ASSET_COLUMNS} FROM asset WHERE id = $1 FOR UPDATE`,
        [id],
      );
      if (locked.rows.length === 0) return { outcome: 'not_found' };
      const existing = mapAssetRow(locked.rows[0]);

      if (data.status !== undefined && data.status !== existing.status) {
        const active = await client.query<{ exists: boolean }>(
          'SELECT EXISTS (SELECT 1 FROM loan WHERE asset_id = $1 AND return_date IS NULL) AS exists',
          [id],
        );
        if (existing.status === 'assigned' || active.rows[0]?.exists) {
          return { outcome: 'on_loan' };
        }
      }

      const { sets, values } = buildUpdate({
        category_id: data.categoryId,
        name: data.name,
        serial_number: data.serialNumber,
        asset_tag: data.assetTag,
        status: data.status,
        purchase_date: data.purchaseDate,
        notes: data.notes,
      });
      if (sets.length === 0) return { outcome: 'updated', asset: existing };

      values.push(id);
      const result = await client.query<AssetRow>(`
        UPDATE asset SET ${sets.join(', ')}
        WHERE id = $${values.length}
        RETURNING ${ASSET_COLUMNS}
      `, values);
      return { outcome: 'updated', asset: mapAssetRow(result.rows[0]) };
    });
  }

  async deleteAsset(id: string): Promise<boolean> {
    const result = await query('DELETE FROM asset WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  }
}
