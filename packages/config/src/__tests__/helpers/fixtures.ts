export const MINIMAL_YAML = `
output:
  undefinedMarker: "-"
`;

export const FULL_YAML = `
resolver:
  caseSensitive: true
  stripSuffixes:
    - '_r\\d+'
  patterns:
    - match: '^(?<locus>[A-Z0-9]+)_P(?<pbs>\\d+)_R(?<rtt>\\d+)'
      key: '{locus}_P{pbs}_R{rtt}'
categories:
  Edited: intended_edit
  Wildtype: unmodified
input:
  layout: amplicon
  quantificationDelimiter: ","
output:
  fractionDigits: 3
workflow:
  oligoPrefix: run7
  scaffold2: true
`;

export const YAML_WITH_ENV_VARS = `
workflow:
  oligoPrefix: \${OLIGO_PREFIX}
  amplicon: \${AMPLICON:ACGT}
`;
