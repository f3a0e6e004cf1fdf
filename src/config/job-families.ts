/**
 * Static search definitions
 * Edit here to change which roles are monitored
 */

export interface JobFamilyDefinition {
  /** Label written to the job_family column */
  label: string;
  /** Terms sent to the adapters, in order */
  searchTerms: readonly string[];
  /** Optional keyword gate applied after the experience filter */
  skillGate?: {
    keywords: readonly string[];
    minMatches: number;
  };
}

// Deep-frozen; every loaded config shares these definitions
function defineFamily(definition: JobFamilyDefinition): JobFamilyDefinition {
  const { skillGate } = definition;
  return Object.freeze({
    ...definition,
    searchTerms: Object.freeze([...definition.searchTerms]),
    skillGate: skillGate && Object.freeze({
      ...skillGate,
      keywords: Object.freeze([...skillGate.keywords]),
    }),
  });
}

export const ETL_SKILLS: readonly string[] = Object.freeze([
  'etl',
  'elt',
  'data pipeline',
  'airflow',
  'spark',
  'kafka',
  'sql',
  'dbt',
  'data warehouse',
  'snowflake',
  'bigquery',
  'redshift',
  'databricks',
  'data modeling',
  'python',
]);

export const REMOTEOK_RELEVANCE_KEYWORDS: readonly string[] = Object.freeze([
  'data engineer',
  'analytics engineer',
  'data scientist',
  'etl',
  'data pipeline',
]);

export const JOB_FAMILIES: readonly JobFamilyDefinition[] = Object.freeze([
  defineFamily({
    label: 'Data Engineer',
    searchTerms: ['Data Engineer'],
  }),
  defineFamily({
    label: 'Analytics Engineer',
    searchTerms: ['Analytics Engineer'],
  }),
  defineFamily({
    label: 'Data Scientist (ETL)',
    searchTerms: [
      'Data Scientist',
      'Data Scientist ETL',
      'Data Scientist SQL',
      'Data Scientist Python',
      'Machine Learning Engineer',
    ],
    skillGate: {
      keywords: ETL_SKILLS,
      minMatches: 2,
    },
  }),
]);
