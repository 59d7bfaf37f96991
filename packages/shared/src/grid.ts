// Grid Reference Types (UTM / MGRS / Maidenhead)

export type Hemisphere = 'N' | 'S';

export interface UTMCoordinate {
  zone: number;         // 1-60
  band: string;         // MGRS latitude band, C-X
  hemisphere: Hemisphere;
  easting: number;      // meters
  northing: number;     // meters
}

export interface GridRepresentation {
  utm: UTMCoordinate | null;
  mgrs: string | null;
  maidenhead: string;
  error?: 'UndefinedProjection';
}
