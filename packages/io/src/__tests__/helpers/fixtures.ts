export const DESIGN_TSV = [
  "design_id\ttarget_locus\tamplicon\tintended_edit\tpbs\trtt",
  "HEK3_P10_R13\tHEK3\tAMP-HEK3\tCTT insertion\t10\t13",
  "HEK3_P13_R10\tHEK3\tAMP-HEK3\tCTT insertion\t\t",
  "",
].join("\n");

export const DESIGN_CSV = [
  "Design_ID,Target_Locus,Amplicon,Intended_Edit,Scaffold_Variant,Spacer",
  "FANCF_P12_R16,FANCF,AMP-FANCF,G>C,scaffold1,gGCCCAGACTGAGCACGTGA",
  "",
].join("\n");

export const WIDE_TSV = [
  "sample\ttotal_reads\tIntended\tIndel",
  "S1_rep1\t10\t5\t2",
  "S2\t\t3\t1",
  "",
].join("\n");

export const AMPLICON_TSV = [
  "Batch\tAmplicon\tUnmodified\tModified\tDiscarded",
  "B1\tReference\t50\t10\t5",
  "B1\tPrime-edited\t20\t4\t1",
  "B2\tReference\t7\t0\t0",
  "",
].join("\n");
