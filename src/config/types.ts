/** Settings of one configured bot instance */
export interface BotConfig {
  name: string;
  token: string;
  /** Forum-enabled staff group where ticket threads live */
  adminGroupId: number;
  webhookSecret: string;
  helloMessage: string;
}

/** Window in which staff are on shift, in the support timezone */
export interface StaffedHours {
  timeZone: string;
  startHour: number;
  endHour: number;
}

export const UNSPECIFIED_ORDER = 'не указан';
