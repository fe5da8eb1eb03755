export const COLORS = {
  amber: '#f2a541',
  cyan: '#61dafb',
  steel: '#8ea0b2',
  muted: '#6b7280',
  danger: '#ff6b6b',
  success: '#6ee7b7',
};

export const RULE = '='.repeat(40);
