export interface AssetBalance {
  free: number;
  used: number;
  total: number;
}

/** Asset symbol → balance; total is always free + used */
export type Balance = Record<string, AssetBalance>;
