export type FlashCategory = 'success' | 'info' | 'warning' | 'danger';

export interface FlashMessage {
  category: FlashCategory;
  message: string;
}

export interface Session {
  userId?: number;
  username?: string;
  flashes: FlashMessage[];
}
