/**
 * W-Section Library
 *
 * Loads AISC W shapes from the JSON catalogue and provides case-insensitive
 * lookup, series listing and side-by-side comparison.
 *
 * Catalogue units: d, bf, tf, tw, rx, ry, ho in cm; A in cm²; Sx, Sy, Zx, Zy
 * in cm³; Ix, Iy, J in cm⁴; Cw in cm⁶; Fy, Fu in kgf/cm².
 */

import wSectionsJson from '../../data/w-sections.json';
import { type ISteelGrade, STEEL_E_KGF_CM2 } from '../standards/AISC360';
import { SectionNotFoundError } from '../standards/errors';
import type { ISectionProperties } from '../standards/types';

/** Catalogue entry as stored in JSON */
export interface IWSectionData {
  designation: string;
  series: string;
  d: number;
  bf: number;
  tf: number;
  tw: number;
  A: number;
  Ix: number;
  Sx: number;
  Zx: number;
  rx: number;
  Iy: number;
  Sy: number;
  Zy: number;
  ry: number;
  J: number;
  Cw: number;
  ho: number;
  Fy: number;
  Fu: number;
}

export type ComparedProperty = 'd' | 'bf' | 'tf' | 'tw' | 'A' | 'Ix' | 'Iy' | 'Sx' | 'Sy' | 'Zx' | 'Zy' | 'rx' | 'ry';

export interface ISectionComparisonRow {
  property: ComparedProperty;
  unit: string;
  first: number;
  second: number;
  differencePct: number;  // (second - first) / first * 100
}

const COMPARED_UNITS: Record<ComparedProperty, string> = {
  d: 'cm', bf: 'cm', tf: 'cm', tw: 'cm',
  A: 'cm²', Ix: 'cm⁴', Iy: 'cm⁴',
  Sx: 'cm³', Sy: 'cm³', Zx: 'cm³', Zy: 'cm³',
  rx: 'cm', ry: 'cm',
};

const COMPARED_PROPERTIES: ComparedProperty[] = ['d', 'bf', 'tf', 'tw', 'A', 'Ix', 'Iy', 'Sx', 'Sy', 'Zx', 'Zy', 'rx', 'ry'];

const W_SECTIONS: IWSectionData[] = wSectionsJson;

/** Copy of a section with the yield and ultimate stress of another grade */
export function withGrade(section: ISectionProperties, grade: ISteelGrade): ISectionProperties {
  return { ...section, Fy: grade.Fy, Fu: grade.Fu };
}

function toSectionProperties(data: IWSectionData): ISectionProperties {
  return {
    designation: data.designation,
    d: data.d, bf: data.bf, tf: data.tf, tw: data.tw,
    A: data.A,
    Ix: data.Ix, Sx: data.Sx, Zx: data.Zx, rx: data.rx,
    Iy: data.Iy, Sy: data.Sy, Zy: data.Zy, ry: data.ry,
    J: data.J, Cw: data.Cw, ho: data.ho,
    Fy: data.Fy, Fu: data.Fu,
    E: STEEL_E_KGF_CM2,
  };
}

/**
 * W-Section Library singleton
 */
class WSectionLibraryClass {
  private sections: Map<string, IWSectionData> = new Map();
  private sortedDesignations: string[] = [];

  constructor() {
    for (const entry of W_SECTIONS) {
      this.sections.set(entry.designation.toUpperCase(), entry);
    }
    this.sortedDesignations = [...this.sections.keys()].sort();
  }

  get size(): number {
    return this.sections.size;
  }

  /** Look up a section; undefined when the designation is unknown */
  findSection(designation: string, grade?: ISteelGrade): ISectionProperties | undefined {
    const data = this.sections.get(designation.trim().toUpperCase());
    if (!data) return undefined;
    const section = toSectionProperties(data);
    return grade ? withGrade(section, grade) : section;
  }

  /** Look up a section; throws SectionNotFoundError naming the key */
  getSection(designation: string, grade?: ISteelGrade): ISectionProperties {
    const section = this.findSection(designation, grade);
    if (!section) throw new SectionNotFoundError(designation);
    return section;
  }

  /**
   * Sorted designations, optionally filtered by a case-insensitive prefix.
   * The filter is a plain prefix: 'W4' also matches W40 and W44.
   */
  listSections(seriesPrefix?: string): string[] {
    if (seriesPrefix === undefined) return [...this.sortedDesignations];
    const prefix = seriesPrefix.trim().toUpperCase();
    return this.sortedDesignations.filter(d => d.startsWith(prefix));
  }

  /** Sorted designations belonging to exactly one series ('W4' excludes W40 and W44) */
  listSectionsInSeries(series: string): string[] {
    const key = series.trim().toUpperCase();
    return this.sortedDesignations.filter(d => this.sections.get(d)?.series.toUpperCase() === key);
  }

  /** Series names (W4 .. W44) ordered by nominal depth */
  listSeries(): string[] {
    const series = new Set(W_SECTIONS.map(s => s.series));
    return [...series].sort((a, b) => Number(a.slice(1)) - Number(b.slice(1)));
  }

  compareSections(first: string, second: string): ISectionComparisonRow[] {
    const a = this.getSection(first);
    const b = this.getSection(second);
    return COMPARED_PROPERTIES.map(property => ({
      property,
      unit: COMPARED_UNITS[property],
      first: a[property],
      second: b[property],
      differencePct: ((b[property] - a[property]) / a[property]) * 100,
    }));
  }
}

export const WSectionLibrary = new WSectionLibraryClass();
