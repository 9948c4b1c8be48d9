import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import type { SchemaObject } from 'ajv';
import { ConfigurationError } from '../core/errors.js';
import { validator } from '../utils/validators.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/**
 * Data files shipped with the package (resolved from src/config and dist/config alike)
 */
const DATA_DIR = path.resolve(__dirname, '../../data');

/**
 * Column names as published in the court exports
 */
export const COLUMNS = {
  court: 'Tribunal',
  process: 'Processo',
  year: 'Ano',
  subject: 'Codigos assuntos',
  activeParty: 'Polo ativo',
  activeNature: 'Polo ativo - Natureza juridica',
  passiveParty: 'Polo passivo',
  passiveNature: 'Polo passivo - Natureza juridica',
} as const;

export const DEFAULT_REGIONS = ['NE', 'NO', 'SE', 'SU', 'CO', 'TRFs'] as const;

export const DEFAULT_PROJECTED_COLUMNS: readonly string[] = [
  COLUMNS.process,
  COLUMNS.subject,
  COLUMNS.activeParty,
  COLUMNS.activeNature,
  COLUMNS.passiveParty,
  COLUMNS.passiveNature,
  COLUMNS.court,
  COLUMNS.year,
];

export const DEFAULT_ANALYSIS_COLUMNS: readonly string[] = [
  COLUMNS.subject,
  COLUMNS.activeNature,
  COLUMNS.passiveNature,
  COLUMNS.activeParty,
  COLUMNS.passiveParty,
];

export const REGIONAL_DIR_NAME = 'Output_AnaliseBR_Saude';
export const CONSOLIDATED_FILE_NAME = 'DADOS_CNJ_FILTRADOS_SAUDE_CONSOLIDADO.csv';
export const REPORTS_DIR_NAME = 'Output_reports';

/**
 * Pipeline Configuration
 *
 * Passed explicitly to every component; nothing below reads process.env.
 */
export interface PipelineConfig {
  readonly inputDir: string;
  readonly outputDir: string;
  readonly regionalDir: string;
  readonly consolidatedFile: string;
  readonly reportsDir: string;
  readonly regions: readonly string[];
  readonly subjectCodes: ReadonlySet<number>;
  readonly subjectColumn: string;
  readonly projectedColumns: readonly string[];
  readonly analysisColumns: readonly string[];
  readonly defendantNatureColumn: string;
  readonly publicEntityKeywords: readonly string[];
  readonly neutralMarker: string;
  readonly delimiter: string;
  readonly topN: number;
}

/**
 * Optional settings accepted from a JSON config file or from code
 */
export interface PipelineConfigOptions {
  inputDir?: string;
  outputDir?: string;
  reportsDir?: string;
  regions?: string[];
  subjectCodes?: number[];
  projectedColumns?: string[];
  analysisColumns?: string[];
  publicEntityKeywords?: string[];
  neutralMarker?: string;
  topN?: number;
}

const stringList = { type: 'array', items: { type: 'string', minLength: 1 }, minItems: 1 };

const configFileSchema: SchemaObject = {
  type: 'object',
  additionalProperties: false,
  properties: {
    inputDir: { type: 'string', minLength: 1 },
    outputDir: { type: 'string', minLength: 1 },
    reportsDir: { type: 'string', minLength: 1 },
    regions: stringList,
    subjectCodes: { type: 'array', items: { type: 'integer' }, minItems: 1 },
    projectedColumns: stringList,
    analysisColumns: stringList,
    publicEntityKeywords: stringList,
    neutralMarker: { type: 'string' },
    topN: { type: 'integer', minimum: 1 },
  },
};

const validateConfigFile = validator.compileSchema<PipelineConfigOptions>(configFileSchema);
const validateCodeList = validator.compileSchema<number[]>({
  type: 'array',
  items: { type: 'integer' },
  minItems: 1,
});
const validateKeywordList = validator.compileSchema<string[]>(stringList);

function readJson(filePath: string, what: string): unknown {
  try {
    return JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Cannot read ${what} from ${filePath}`, { cause: error });
  }
}

/**
 * Load the 44 health-litigation subject codes shipped in data/
 */
export function loadHealthSubjectCodes(): number[] {
  const filePath = path.join(DATA_DIR, 'health-subject-codes.json');
  const result = validator.validate(validateCodeList, readJson(filePath, 'subject codes'));
  if (!result.data) {
    throw new ConfigurationError(
      `Invalid subject code list ${filePath}:\n${validator.formatErrors(result.errors)}`
    );
  }
  return result.data;
}

/**
 * Load the passive-party legal-nature keywords that mark a public entity
 */
export function loadPublicEntityKeywords(): string[] {
  const filePath = path.join(DATA_DIR, 'public-entity-keywords.json');
  const result = validator.validate(validateKeywordList, readJson(filePath, 'entity keywords'));
  if (!result.data) {
    throw new ConfigurationError(
      `Invalid keyword list ${filePath}:\n${validator.formatErrors(result.errors)}`
    );
  }
  return result.data;
}

/**
 * Build a frozen configuration from explicit options
 *
 * @param options Settings to apply over the defaults
 * @param baseDir Directory that relative paths are resolved against
 */
export function createPipelineConfig(
  options: PipelineConfigOptions = {},
  baseDir: string = process.cwd()
): PipelineConfig {
  const outputDir = path.resolve(baseDir, options.outputDir ?? '.');
  const projectedColumns = options.projectedColumns ?? DEFAULT_PROJECTED_COLUMNS;

  if (!projectedColumns.includes(COLUMNS.subject)) {
    throw new ConfigurationError(
      `projectedColumns must include the subject column '${COLUMNS.subject}'`
    );
  }

  return Object.freeze({
    inputDir: path.resolve(baseDir, options.inputDir ?? 'AnaliseBR'),
    outputDir,
    regionalDir: path.join(outputDir, REGIONAL_DIR_NAME),
    consolidatedFile: path.join(outputDir, CONSOLIDATED_FILE_NAME),
    reportsDir: options.reportsDir
      ? path.resolve(baseDir, options.reportsDir)
      : path.join(outputDir, REPORTS_DIR_NAME),
    regions: Object.freeze([...(options.regions ?? DEFAULT_REGIONS)]),
    subjectCodes: new Set(options.subjectCodes ?? loadHealthSubjectCodes()),
    subjectColumn: COLUMNS.subject,
    projectedColumns: Object.freeze([...projectedColumns]),
    analysisColumns: Object.freeze([...(options.analysisColumns ?? DEFAULT_ANALYSIS_COLUMNS)]),
    defendantNatureColumn: COLUMNS.passiveNature,
    publicEntityKeywords: Object.freeze([
      ...(options.publicEntityKeywords ?? loadPublicEntityKeywords()),
    ]),
    neutralMarker: options.neutralMarker ?? '',
    delimiter: ';',
    topN: options.topN ?? 10,
  });
}

/**
 * Load configuration for the CLI
 *
 * Order: defaults, then the optional JSON config file, then directory
 * overrides from the environment (HL_INPUT_DIR, HL_OUTPUT_DIR, HL_REPORTS_DIR).
 */
export function loadPipelineConfig(
  params: { configPath?: string; env?: NodeJS.ProcessEnv } = {}
): PipelineConfig {
  const env = params.env ?? process.env;
  let options: PipelineConfigOptions = {};
  let baseDir = process.cwd();

  if (params.configPath) {
    const configPath = path.resolve(params.configPath);
    if (!fs.existsSync(configPath)) {
      throw new ConfigurationError(`Config file not found: ${configPath}`);
    }

    const result = validator.validate(validateConfigFile, readJson(configPath, 'config'));
    if (!result.data) {
      throw new ConfigurationError(
        `Invalid config file ${configPath}:\n${validator.formatErrors(result.errors)}`
      );
    }
    options = result.data;
    baseDir = path.dirname(configPath);
  }

  // Environment paths are relative to the working directory, not the config file
  const fromEnv = (value: string | undefined) =>
    value ? path.resolve(process.cwd(), value) : undefined;

  return createPipelineConfig(
    {
      ...options,
      inputDir: fromEnv(env.HL_INPUT_DIR) ?? options.inputDir,
      outputDir: fromEnv(env.HL_OUTPUT_DIR) ?? options.outputDir,
      reportsDir: fromEnv(env.HL_REPORTS_DIR) ?? options.reportsDir,
    },
    baseDir
  );
}
