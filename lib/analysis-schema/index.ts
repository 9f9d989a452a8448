// 抽象状態を人が読める形に落とすための表示用スキーマ

export const STATE_SCHEMA_VERSION = "1.0.0" as const;

export type StateDump = {
  /** 互換性管理のためのスキーマバージョン */
  schemaVersion: typeof STATE_SCHEMA_VERSION;
  sections: StateSection[];
};

export type StateSection = {
  id: string;
  title: string;
  type: "key-value";
  data: Record<string, DisplayValue>;
  description?: string;
  alert?: boolean;
};

export type DisplayValue = {
  label: string;
  style: "neutral" | "safe" | "warning" | "danger" | "info";
  description?: string;
  // 値の種別 (interval / address)
  kind?: "interval" | "address";
};
