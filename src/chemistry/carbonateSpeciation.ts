export type DiproticAcid = {
  name: string;
  ka1: number;
  ka2: number;
  /** pKa values marked on the speciation plot. */
  pka1: number;
  pka2: number;
  species: readonly [string, string, string];
};

export const CARBONIC_ACID: Readonly<DiproticAcid> = Object.freeze({
  name: 'carbonic acid',
  ka1: 3.54e-4,
  ka2: 4.69e-11,
  pka1: 3.45,
  pka2: 10.329,
  species: ['H2CO3', 'HCO3^-', 'CO3^{2-}'] as const,
});

export type SpeciationPoint = {
  pH: number;
  fractions: [number, number, number];
};

/**
 * Mass balance over the two acid equilibria:
 *   f0 = h^2 / D, f1 = h Ka1 / D, f2 = Ka1 Ka2 / D, D = h^2 + h Ka1 + Ka1 Ka2
 * with h = [H3O+] = 10^-pH.
 */
export const speciationAt = (pH: number, acid: DiproticAcid = CARBONIC_ACID): SpeciationPoint => {
  if (!Number.isFinite(pH)) {
    throw new RangeError(`pH must be finite (received ${pH})`);
  }
  const h = Math.pow(10, -pH);
  const hh = h * h;
  const hk = h * acid.ka1;
  const kk = acid.ka1 * acid.ka2;
  const denominator = hh + hk + kk;
  return {
    pH,
    fractions: [hh / denominator, hk / denominator, kk / denominator],
  };
};

export const speciationGrid = (acid: DiproticAcid = CARBONIC_ACID): number[] => {
  const values: number[] = [];
  for (let i = 0; i <= 140; i++) {
    values.push(i / 10);
  }
  values.push(acid.pka1, acid.pka2);
  return values.sort((a, b) => a - b);
};

export const speciationCurve = (acid: DiproticAcid = CARBONIC_ACID): SpeciationPoint[] =>
  speciationGrid(acid).map((pH) => speciationAt(pH, acid));

export const speciationTablePoints = (acid: DiproticAcid = CARBONIC_ACID): number[] => {
  const values: number[] = [];
  for (let pH = 1; pH <= 14; pH++) {
    values.push(pH);
  }
  values.push(acid.pka1, acid.pka2);
  return values.sort((a, b) => a - b);
};

export const formatSpeciationRow = (point: SpeciationPoint): string => {
  const [f0, f1, f2] = point.fractions;
  return [
    point.pH.toFixed(3).padStart(6),
    f0.toFixed(6).padStart(8),
    f1.toFixed(6).padStart(8),
    f2.toFixed(6).padStart(8),
  ].join(' ');
};

export const formatSpeciationTable = (acid: DiproticAcid = CARBONIC_ACID): string[] => {
  const header = `   pH   ${acid.species[0].padEnd(8)} ${acid.species[1].padEnd(8)} ${acid.species[2]}`;
  return [
    header,
    ...speciationTablePoints(acid).map((pH) => formatSpeciationRow(speciationAt(pH, acid))),
  ];
};
