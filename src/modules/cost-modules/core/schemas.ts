/**
 * Cost module configuration schemas.
 *
 * One schema per module kind, tagged by `kind`. The same schemas validate the
 * HTTP body, CLI input files and the YAML module templates.
 */

import { Type, type Static } from '@sinclair/typebox';

// ─────────────────────────────────────────────────────────────────────────────
// Shared fields
// ─────────────────────────────────────────────────────────────────────────────

const LabelSchema = Type.String({ minLength: 1, description: 'Component name in the ledger' });
const CountSchema = Type.Number({ minimum: 0 });
const PositiveIntegerSchema = Type.Integer({ minimum: 1 });

export const AdministrativeLevelSchema = Type.Union(
  [Type.Literal('national'), Type.Literal('provincial'), Type.Literal('district')],
  { description: 'Administrative level an activity takes place at' }
);

export const CadreLevelSchema = Type.Union(
  [Type.Literal(1), Type.Literal(2), Type.Literal(3), Type.Literal(4), Type.Literal(5)],
  { description: 'ISCO-08 skill level' }
);

export const DistancePercentileSchema = Type.Union([
  Type.Literal(10),
  Type.Literal(20),
  Type.Literal(30),
  Type.Literal(40),
  Type.Literal(50),
  Type.Literal(60),
  Type.Literal(70),
  Type.Literal(80),
  Type.Literal(90),
  Type.Literal(95),
  Type.Literal(100),
]);

export const FacilityTypeSchema = Type.Union([
  Type.Literal('regional_hospitals'),
  Type.Literal('provincial_hospitals'),
  Type.Literal('district_hospitals'),
  Type.Literal('health_centres'),
  Type.Literal('health_posts'),
]);

export const MoneyAtSchema = Type.Object(
  {
    amount: Type.Number({ minimum: 0 }),
    currency: Type.String({ minLength: 2, maxLength: 3, description: 'ISO3 code, USD or I$' }),
    year: Type.Integer(),
  },
  { additionalProperties: false }
);

// ─────────────────────────────────────────────────────────────────────────────
// Module items
// ─────────────────────────────────────────────────────────────────────────────

export const PersonnelItemSchema = Type.Object(
  {
    label: LabelSchema,
    cadreLevel: CadreLevelSchema,
    headcount: Type.Optional(CountSchema),
    division: Type.Optional(AdministrativeLevelSchema),
    perDivision: Type.Optional(Type.Boolean()),
    fitToPopulation: Type.Optional(
      Type.Boolean({
        description: 'Headcount is set for a standardized population per division',
      })
    ),
  },
  { additionalProperties: false }
);

export const PerDiemItemSchema = Type.Object(
  {
    label: LabelSchema,
    division: AdministrativeLevelSchema,
    local: Type.Optional(Type.Boolean()),
    travellers: CountSchema,
    days: CountSchema,
    tripsPerYear: Type.Optional(CountSchema),
  },
  { additionalProperties: false }
);

export const TransportItemSchema = Type.Object(
  {
    label: LabelSchema,
    vehicleModel: Type.String({ minLength: 1 }),
    distanceKm: Type.Optional(CountSchema),
    tripsPerYear: Type.Optional(CountSchema),
    vehicles: Type.Optional(CountSchema),
    roundTrip: Type.Optional(Type.Boolean()),
    fuelPricePerLitre: Type.Optional(MoneyAtSchema),
  },
  { additionalProperties: false }
);

export const OfficeSuppliesItemSchema = Type.Object(
  {
    label: Type.Optional(LabelSchema),
    item: Type.String({ minLength: 1 }),
    quantity: Type.Optional(CountSchema),
    usefulLifeYears: Type.Optional(Type.Number({ exclusiveMinimum: 0 })),
  },
  { additionalProperties: false }
);

export const FacilityDistributionItemSchema = Type.Object(
  {
    label: LabelSchema,
    item: Type.String({ minLength: 1 }),
    unitsPerFacility: Type.Optional(CountSchema),
    facilityTypes: Type.Array(FacilityTypeSchema, { minItems: 1 }),
    perDivision: Type.Optional(Type.Union([Type.Literal('provincial'), Type.Literal('district')])),
  },
  { additionalProperties: false }
);

export const LogisticsItemSchema = Type.Object(
  {
    label: LabelSchema,
    vehicleModel: Type.String({ minLength: 1 }),
    division: AdministrativeLevelSchema,
    tripsPerDivision: Type.Optional(CountSchema),
    tripsPerMillionPeople: Type.Optional(CountSchema),
    percentile: Type.Optional(DistancePercentileSchema),
  },
  { additionalProperties: false }
);

export const MeetingAttendeeSchema = Type.Object(
  {
    label: LabelSchema,
    count: CountSchema,
    local: Type.Optional(Type.Boolean()),
    travelling: Type.Optional(Type.Boolean()),
  },
  { additionalProperties: false }
);

export const MeetingItemSchema = Type.Object(
  {
    label: LabelSchema,
    division: AdministrativeLevelSchema,
    days: CountSchema,
    meetingsPerYear: Type.Optional(CountSchema),
    attendees: Type.Array(MeetingAttendeeSchema, { minItems: 1 }),
    vehicleModel: Type.Optional(Type.String({ minLength: 1 })),
    passengersPerVehicle: Type.Optional(PositiveIntegerSchema),
    roomSizeM2: Type.Optional(CountSchema),
    /** Venue hire per square metre per day */
    roomRatePerM2: Type.Optional(MoneyAtSchema),
  },
  { additionalProperties: false }
);

export const MediaItemSchema = Type.Object(
  {
    label: LabelSchema,
    unitCost: MoneyAtSchema,
    per: Type.Union([Type.Literal('person'), Type.Literal('thousand')]),
    coverage: Type.Optional(Type.Number({ minimum: 0, maximum: 1 })),
  },
  { additionalProperties: false }
);

// ─────────────────────────────────────────────────────────────────────────────
// Module configurations
// ─────────────────────────────────────────────────────────────────────────────

export const PersonnelConfigSchema = Type.Object(
  { kind: Type.Literal('personnel'), items: Type.Array(PersonnelItemSchema) },
  { additionalProperties: false }
);

export const PerDiemConfigSchema = Type.Object(
  { kind: Type.Literal('per_diem'), items: Type.Array(PerDiemItemSchema) },
  { additionalProperties: false }
);

export const TransportConfigSchema = Type.Object(
  { kind: Type.Literal('transport'), items: Type.Array(TransportItemSchema) },
  { additionalProperties: false }
);

export const OfficeSuppliesConfigSchema = Type.Object(
  { kind: Type.Literal('office_supplies'), items: Type.Array(OfficeSuppliesItemSchema) },
  { additionalProperties: false }
);

export const FacilityDistributionConfigSchema = Type.Object(
  {
    kind: Type.Literal('facility_distribution'),
    items: Type.Array(FacilityDistributionItemSchema),
  },
  { additionalProperties: false }
);

export const LogisticsConfigSchema = Type.Object(
  { kind: Type.Literal('logistics'), items: Type.Array(LogisticsItemSchema) },
  { additionalProperties: false }
);

export const MeetingsConfigSchema = Type.Object(
  { kind: Type.Literal('meetings'), items: Type.Array(MeetingItemSchema) },
  { additionalProperties: false }
);

export const MediaConfigSchema = Type.Object(
  { kind: Type.Literal('media'), items: Type.Array(MediaItemSchema) },
  { additionalProperties: false }
);

export const ModuleConfigSchema = Type.Union([
  PersonnelConfigSchema,
  PerDiemConfigSchema,
  TransportConfigSchema,
  OfficeSuppliesConfigSchema,
  FacilityDistributionConfigSchema,
  LogisticsConfigSchema,
  MeetingsConfigSchema,
  MediaConfigSchema,
]);

export type AdministrativeLevel = Static<typeof AdministrativeLevelSchema>;
export type PersonnelConfig = Static<typeof PersonnelConfigSchema>;
export type PerDiemConfig = Static<typeof PerDiemConfigSchema>;
export type TransportConfig = Static<typeof TransportConfigSchema>;
export type OfficeSuppliesConfig = Static<typeof OfficeSuppliesConfigSchema>;
export type FacilityDistributionConfig = Static<typeof FacilityDistributionConfigSchema>;
export type LogisticsConfig = Static<typeof LogisticsConfigSchema>;
export type MeetingsConfig = Static<typeof MeetingsConfigSchema>;
export type MediaConfig = Static<typeof MediaConfigSchema>;
export type ModuleConfig = Static<typeof ModuleConfigSchema>;
export type CostModuleKind = ModuleConfig['kind'];

export const COST_MODULE_KINDS: readonly CostModuleKind[] = [
  'personnel',
  'per_diem',
  'transport',
  'office_supplies',
  'facility_distribution',
  'logistics',
  'meetings',
  'media',
];

export const isCostModuleKind = (value: string): value is CostModuleKind =>
  COST_MODULE_KINDS.some((kind) => kind === value);
