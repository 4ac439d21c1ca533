import type { JobsConfig, MomapJobConfig, PipelineConfig } from "./types.js";

const FUNCTIONAL =
  "TPSSh/def2svp scrf=solvent=CH2Cl2 empiricaldispersion=gd3bj " +
  "IOp(3/174=1000000,3/175=2238200,3/177=452900,3/178=4655000) nosymm";

export const DEFAULT_ROUTES = {
  s0_opt: `#p opt ${FUNCTIONAL}`,
  s0_freq: `#p freq ${FUNCTIONAL}`,
  s1_opt: `#p td(singlet,nstate=10) opt ${FUNCTIONAL}`,
  s1_freq: `#p td(singlet,nstate=10) freq ${FUNCTIONAL}`,
  t1_opt: `#p opt ${FUNCTIONAL}`,
  t1_freq: `#p freq ${FUNCTIONAL}`,
} as const;

const BROADENING = {
  spectra0: ".f.",
  isgauss: ".f.",
  BroadenType: "gaussian",
  Broadenfunc: "frequency",
} as const;

export const DEFAULT_MOMAP: MomapJobConfig = {
  environment: "source /opt/momap/env.sh",
  common: {
    Temp: 300,
    tmax: 3000,
    dt: 0.01,
    NScale: 10,
    Emin: -0.3,
    Emax: 0.3,
    dE: 0.00001,
    DUSHIN: ".f.",
    HERZ: ".f.",
    FreqScale: 1.0,
  },
  kr: { ...BROADENING, FWHM: 20, EDMA: 1.0 },
  kisc: { ...BROADENING, FWHM: 50 },
  kic: {
    ...BROADENING,
    DUSHIN: ".t.",
    isgauss: ".t.",
    FWHM: 500,
    NScale: 20,
    CoulFile: "evc.cart.nac",
  },
};

export const DEFAULT_JOBS: JobsConfig = {
  partition: "compute",
  nproc: 56,
  submitCommand: "sbatch",
  submitTimeoutMs: 60_000,
  gaussian: {
    memory: "256GB",
    scratch: "/tmp",
    environment: "module load gaussian/g16",
    routes: DEFAULT_ROUTES,
  },
  orca: {
    executable: "orca",
    scratch: "/tmp",
    environment: "module load orca/6.0.1",
    keywords: "TPSSh DKH2 DKH-def2-tzvp RIJCOSX SARC/J CPCM(DCM) miniprint TightSCF defgrid3",
    maxcore: 8000,
    heavyMetals: ["Pt", "Ir", "Os", "Ru", "Rh", "Re"],
    heavyMetalBasis: "SARC-DKH-TZVP",
  },
  momap: DEFAULT_MOMAP,
};

export const DEFAULT_CONFIG: PipelineConfig = {
  sourceDir: "./xyz",
  resultsDir: "./results",
  statusFile: "./job_status.csv",
  maxConcurrent: 10,
  pollIntervalMs: 5 * 60_000,
  stallTimeoutMs: 48 * 3_600_000,
  autoExit: { enabled: false, idleCycles: 3 },
  alert: { webhookUrl: null, timeoutMs: 10_000 },
  recovery: {
    geometryRetryBudgetMs: 8 * 3_600_000,
    reorganizationThreshold: 5000,
    maxErrorRetries: 3,
  },
  temperature: 300,
  logLevel: "info",
  jobs: DEFAULT_JOBS,
};
