export const DESIGNS_TSV = [
  "design_id\ttarget_locus\tamplicon\tintended_edit\tspacer\textension_sense\textension_antisense",
  "HEK3_P13_R10\tHEK3\tAMP1\tCTT ins\t\tgtgcAAAGTG\taaaaCACTTTgcac",
  "HEK3_P10_R13\tHEK3\tAMP1\tCTT ins\tcaccgGGCCCAGACTGAGCACGTGAgtttt\tgtgcTCTGCCATCAGAGTGCT\taaaaAGCACTCTGATGGCAGAgcac",
  "FANCF_P12_R16\tFANCF\tAMP2\tG>C\tGGAATCCCTTCTGCAGCACC\t\t",
  "",
].join("\n");

export const SAMPLE_SHEET_TSV = [
  "name\tfastq_r1\tfastq_r2",
  "HEK3_P10_R13_rep1\ts1_R1.fastq.gz\ts1_R2.fastq.gz",
  "HEK3_P13_R10_rep1\ts2_R1.fastq.gz\ts2_R2.fastq.gz",
  "HEK3_P13_R10_rep2\ts3_R1.fastq.gz\ts3_R2.fastq.gz",
  "EMX1_P9_R9\ts4_R1.fastq.gz\ts4_R2.fastq.gz",
  "HEK3_P10_R13_rep2\ts5_R1.fastq.gz\ts5_R2.fastq.gz",
  "",
].join("\n");

export const AMPLICON_SEQ = "ACGTACGTAAAC";
export const SCAFFOLD_SEQ = "GTTTTAGAGCTA";
