/**
 * Field Mapping Table
 *
 * Recognized infobox label variants -> canonical attribute. Labels are
 * compared after normalizeLabel() (lower-case, footnotes and trailing colon
 * stripped). For each attribute the list order is the synonym priority:
 * an earlier variant with a usable value beats any later one.
 *
 * Prefix mode is used where source labels carry qualifiers, e.g.
 * "Einwohner: 31. Dez. 2023", "Fläche (km²)" or "Höhe ü. NHN".
 */

import type { EntityAttribute } from '../core/types.js';

export type LabelMatchMode = 'exact' | 'prefix';

/**
 * Attributes the infobox table can carry
 */
export type MappedAttribute = Exclude<EntityAttribute, 'coordinatesUrl' | 'fullText' | 'populationDate'>;

export interface LabelMapping {
  readonly label: string;
  readonly attribute: MappedAttribute;
  readonly match: LabelMatchMode;
}

export const FIELD_MAPPING_TABLE: readonly LabelMapping[] = Object.freeze([
  { label: 'einwohner', attribute: 'population', match: 'prefix' },
  { label: 'bevölkerung', attribute: 'population', match: 'exact' },
  { label: 'population', attribute: 'population', match: 'prefix' },
  { label: 'inhabitants', attribute: 'population', match: 'prefix' },

  { label: 'fläche', attribute: 'areaKm2', match: 'prefix' },
  { label: 'area', attribute: 'areaKm2', match: 'prefix' },

  { label: 'höhe', attribute: 'elevationM', match: 'prefix' },
  { label: 'elevation', attribute: 'elevationM', match: 'prefix' },

  { label: 'gemeindeschlüssel', attribute: 'municipalityCode', match: 'prefix' },
  { label: 'amtlicher gemeindeschlüssel', attribute: 'municipalityCode', match: 'exact' },
  { label: 'municipality code', attribute: 'municipalityCode', match: 'exact' },

  { label: 'landkreis', attribute: 'district', match: 'exact' },
  { label: 'kreis', attribute: 'district', match: 'exact' },
  { label: 'district', attribute: 'district', match: 'exact' },

  { label: 'regierungsbezirk', attribute: 'region', match: 'exact' },
  { label: 'region', attribute: 'region', match: 'exact' },

  { label: 'bundesland', attribute: 'state', match: 'exact' },
  { label: 'state', attribute: 'state', match: 'exact' },

  { label: 'postleitzahl', attribute: 'postalCode', match: 'prefix' },
  { label: 'postal code', attribute: 'postalCode', match: 'prefix' },

  { label: 'vorwahl', attribute: 'areaCode', match: 'prefix' },
  { label: 'area code', attribute: 'areaCode', match: 'prefix' },
  { label: 'dialling code', attribute: 'areaCode', match: 'prefix' },

  { label: 'kfz-kennzeichen', attribute: 'vehicleCode', match: 'exact' },
  { label: 'kfz', attribute: 'vehicleCode', match: 'prefix' },
  { label: 'vehicle registration', attribute: 'vehicleCode', match: 'prefix' },

  { label: 'koordinaten', attribute: 'coordinates', match: 'exact' },
  { label: 'coordinates', attribute: 'coordinates', match: 'exact' },

  { label: 'website', attribute: 'website', match: 'exact' },
  { label: 'webpräsenz', attribute: 'website', match: 'exact' },
  { label: 'webseite', attribute: 'website', match: 'exact' },

  { label: 'bürgermeister', attribute: 'mayor', match: 'prefix' },
  { label: 'oberbürgermeister', attribute: 'mayor', match: 'prefix' },
  { label: 'mayor', attribute: 'mayor', match: 'exact' },
  { label: 'lord mayor', attribute: 'mayor', match: 'exact' },
] satisfies LabelMapping[]);
