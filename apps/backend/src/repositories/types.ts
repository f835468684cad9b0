export type { ContentReferenceSource, ImageRepository } from '../services/images/types.js';

export type ImageRow = {
  id: number;
  name: string;
  path: string;
  url: string;
  type: string;
  uploaded_to: number | null;
  created_by: number | null;
  updated_by: number | null;
  created_at: Date;
  updated_at: Date;
};
