/**
 * Catalog Repository Interface
 * Asset categories and assets.
 */

import type {
  AdministrativeAssetStatus,
  Asset,
  AssetCategory,
  AssetStatus,
} from '@loandesk/domain';

export interface AssetFilters {
  /** Case-insensitive name prefix. */
  name?: string;
  /** Case-insensitive serial number prefix. */
  serialNumber?: string;
  status?: AssetStatus[];
  categoryId?: string;
}

export interface CreateCategoryData {
  name: string;
}

export type UpdateCategoryData = Partial<CreateCategoryData>;

export interface CreateAssetData {
  categoryId: string;
  name: string;
  serialNumber: string;
  assetTag: string | null;
  status: AdministrativeAssetStatus;
  purchaseDate: string | null;
  notes: string | null;
}

export type UpdateAssetData = Partial<CreateAssetData>;

export type UpdateAssetResult =
  | { outcome: 'updated'; asset: Asset }
  | { outcome: 'not_found' }
  | { outcome: 'on_loan' };

export interface ICatalogRepository {
  listCategories(): Promise<AssetCategory[]>;
  findCategoryById(id: string): Promise<AssetCategory | null>;
  createCategory(data: CreateCategoryData): Promise<AssetCategory>;
  updateCategory(id: string, data: UpdateCategoryData): Promise<AssetCategory | null>;
  /** Fails with a foreign-key violation while the category still has assets. */
  deleteCategory(id: string): Promise<boolean>;

  listAssets(filters?: AssetFilters): Promise<Asset[]>;
  findAssetById(id: string): Promise<Asset | null>;
  createAsset(data: CreateAssetData): Promise<Asset>;
  /**
   * Applies the change with the asset row locked. A status change is refused
   * with `on_loan` while the asset is assigned or has an active loan.
   */
  updateAsset(id: string, data: UpdateAssetData): Promise<UpdateAssetResult>;
  deleteAsset(id: string): Promise<boolean>;
}
