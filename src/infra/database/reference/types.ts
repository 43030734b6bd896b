// Ignore naming conventions for database tables

// pg hands back DOUBLE PRECISION columns as numbers, NUMERIC columns as strings
export type NumericColumn = number | string | null;

// costs_salaries: annual salary per ISCO-08 skill level
export interface CostsSalaries {
  ISO3: string;
  ISCO_08_level: number | string;
  annual_salary: NumericColumn;
  currency: string;
  year: number | string;
}

// costs_per_diems: daily subsistence allowance by administrative level
export interface CostsPerDiems {
  ISO3: string;
  dsa_national: NumericColumn;
  dsa_upper: NumericColumn;
  dsa_lower: NumericColumn;
  currency: string;
  year: number | string;
  local_proportion: NumericColumn;
}

// costs_transport: vehicle catalog
export interface CostsTransport {
  vehicle_model: string;
  operating_cost_per_km: NumericColumn;
  consumption_litres_per_km: NumericColumn;
  currency: string;
  year: number | string;
}

// office_supplies_and_furniture: item catalog
export interface OfficeSuppliesAndFurniture {
  item: string;
  price: NumericColumn;
  currency: string;
  year: number | string;
}

// distance_between_regions: percentile distances (km) between regions
export interface DistanceBetweenRegions {
  ISO3: string;
  DDist10: NumericColumn;
  DDist20: NumericColumn;
  DDist30: NumericColumn;
  DDist40: NumericColumn;
  DDist50: NumericColumn;
  DDist60: NumericColumn;
  DDist70: NumericColumn;
  DDist80: NumericColumn;
  DDist90: NumericColumn;
  DDist95: NumericColumn;
  DDist100: NumericColumn;
  size_km_sq: NumericColumn;
}

export interface AdministrativeDivisions {
  ISO3: string;
  provincial_divisions: NumericColumn;
  district_divisions: NumericColumn;
}

export interface HealthcareFacilities {
  ISO3: string;
  regional_hospitals: NumericColumn;
  provincial_hospitals: NumericColumn;
  district_hospitals: NumericColumn;
  health_centres: NumericColumn;
  health_posts: NumericColumn;
}

// economic_statistics: one column per year, named "1960 [YR1960]" .. "2021 [YR2021]"
export interface EconomicStatistics {
  'Country Code': string;
  'Series Name': string;
  [yearColumn: string]: NumericColumn;
}

// population: projections in thousands of persons
export interface Population {
  Iso3: string;
  Time: number | string;
  Variant: string;
  Value: NumericColumn;
}

export interface ReferenceDatabase {
  costs_salaries: CostsSalaries;
  costs_per_diems: CostsPerDiems;
  costs_transport: CostsTransport;
  office_supplies_and_furniture: OfficeSuppliesAndFurniture;
  distance_between_regions: DistanceBetweenRegions;
  administrative_divisions: AdministrativeDivisions;
  healthcare_facilities: HealthcareFacilities;
  economic_statistics: EconomicStatistics;
  population: Population;
}
