/**
 * Utility functions for calculating section properties of the beam.
 */
export class SectionUtils {
  /**
   * Second moment of area of a solid rectangular section about its
   * horizontal centroidal axis: I = b * h^3 / 12.
   * @param b Width of the section (m)
   * @param h Total depth of the section (m)
   */
  static momentOfInertia(b: number, h: number): number {
    return (b * Math.pow(h, 3)) / 12;
  }

  static flexuralRigidity(E: number, I: number): number {
    return E * I;
  }
}
