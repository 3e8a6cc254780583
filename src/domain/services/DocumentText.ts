/**
 * Document Text - deterministic text renderings of candidates and jobs
 *
 * Three renderings with different budgets:
 * - profile input: bounded, fed to profile extraction
 * - embedding text: full task descriptions, most telling content first
 * - evaluation sections: everything, untruncated, for deep evaluation
 */

import type {
  Candidate,
  EducationEntry,
  FurtherEducationEntry,
  LanguageEntry,
  WorkHistoryEntry,
} from '../entities/Candidate.js';
import type { Job } from '../entities/Job.js';
import { SENIORITY_LABELS, type CandidateProfile, type JobProfile } from '../entities/Profile.js';

// =============================================================================
// LIMITS
// =============================================================================

export const PROFILE_INPUT_LIMITS = {
  workHistoryEntries: 10,
  taskChars: 300,
  educationEntries: 5,
  furtherEducationEntries: 5,
  languages: 5,
  skills: 20,
  itSkills: 15,
  erpSystems: 10,
  jobTextChars: 3000,
} as const;

export const EMBEDDING_TEXT_LIMITS = {
  coreTaskChars: 300,
  cvFallbackChars: 2000,
} as const;

/**
 * Below these lengths the profile input is not worth a model call
 */
export const MIN_PROFILE_INPUT_CHARS = {
  candidate: 50,
  job: 30,
} as const;

export const NO_DATA_PLACEHOLDER = 'No data available';

// =============================================================================
// SHARED FORMATTERS
// =============================================================================

function formatRole(entry: WorkHistoryEntry): string {
  let line = entry.position;
  if (entry.company) {
    line += ` at ${entry.company}`;
  }
  if (entry.startDate) {
    line += ` (${entry.startDate} to ${entry.endDate ?? 'present'})`;
  }
  return line;
}

function formatEducation(entry: EducationEntry): string | null {
  const parts = [entry.degree, entry.fieldOfStudy, entry.institution].filter((part): part is string => !!part);
  if (parts.length === 0) {
    return null;
  }
  return entry.year ? `${parts.join(', ')} (${entry.year})` : parts.join(', ');
}

function formatFurtherEducation(entry: FurtherEducationEntry): string {
  return entry.institution ? `${entry.title}, ${entry.institution}` : entry.title;
}

function formatLanguage(entry: LanguageEntry): string {
  return entry.level ? `${entry.language} (${entry.level})` : entry.language;
}

function bulletList(items: Array<string | null>): string[] {
  return items.filter((item): item is string => item !== null).map((item) => `  - ${item}`);
}

function truncate(text: string, maxChars: number): string {
  return text.length > maxChars ? text.slice(0, maxChars) : text;
}

// =============================================================================
// PROFILE INPUT (bounded)
// =============================================================================

export function renderCandidateProfileInput(candidate: Candidate): string {
  const limits = PROFILE_INPUT_LIMITS;
  const parts: string[] = [];

  if (candidate.currentPosition) {
    parts.push(`Current position: ${candidate.currentPosition}`);
  }
  if (candidate.currentCompany) {
    parts.push(`Current company: ${candidate.currentCompany}`);
  }

  if (candidate.workHistory.length > 0) {
    parts.push('\nWork history:');
    for (const entry of candidate.workHistory.slice(0, limits.workHistoryEntries)) {
      parts.push(`  - ${formatRole(entry)}`);
      if (entry.description) {
        parts.push(`    Tasks: ${truncate(entry.description, limits.taskChars)}`);
      }
    }
  }

  const education = bulletList(candidate.education.slice(0, limits.educationEntries).map(formatEducation));
  if (education.length > 0) {
    parts.push('\nEducation:', ...education);
  }

  const furtherEducation = bulletList(
    candidate.furtherEducation.slice(0, limits.furtherEducationEntries).map(formatFurtherEducation)
  );
  if (furtherEducation.length > 0) {
    parts.push('\nFurther education:', ...furtherEducation);
  }

  if (candidate.skills.length > 0) {
    parts.push(`\nSkills: ${candidate.skills.slice(0, limits.skills).join(', ')}`);
  }
  if (candidate.itSkills.length > 0) {
    parts.push(`IT skills: ${candidate.itSkills.slice(0, limits.itSkills).join(', ')}`);
  }
  if (candidate.erp.length > 0) {
    parts.push(`ERP systems: ${candidate.erp.slice(0, limits.erpSystems).join(', ')}`);
  }
  if (candidate.languages.length > 0) {
    parts.push(`Languages: ${candidate.languages.slice(0, limits.languages).map(formatLanguage).join(', ')}`);
  }

  if (candidate.category) {
    parts.push(`\nCategory: ${candidate.category}`);
  }
  if (candidate.classifiedRoles.length > 0) {
    parts.push(`Assigned roles: ${candidate.classifiedRoles.join(', ')}`);
  }

  return parts.length > 0 ? parts.join('\n') : NO_DATA_PLACEHOLDER;
}

export function renderJobProfileInput(job: Job): string {
  const parts: string[] = [];

  if (job.position) {
    parts.push(`Position: ${job.position}`);
  }
  if (job.companyName) {
    parts.push(`Company: ${job.companyName}`);
  }
  if (job.industry) {
    parts.push(`Industry: ${job.industry}`);
  }
  if (job.companySize) {
    parts.push(`Company size: ${job.companySize}`);
  }
  if (job.employmentType) {
    parts.push(`Employment type: ${job.employmentType}`);
  }
  if (job.jobText) {
    parts.push(`\nJob posting:\n${truncate(job.jobText, PROFILE_INPUT_LIMITS.jobTextChars)}`);
  }
  if (job.category) {
    parts.push(`\nCategory: ${job.category}`);
  }
  if (job.classifiedRoles.length > 0) {
    parts.push(`Assigned roles: ${job.classifiedRoles.join(', ')}`);
  }

  return parts.length > 0 ? parts.join('\n') : NO_DATA_PLACEHOLDER;
}

// =============================================================================
// EMBEDDING TEXT (full task descriptions, core profile first)
// =============================================================================

/**
 * No name or contact data; the opening summary steers the vector, so it
 * names the role and the latest tasks before the full history.
 */
export function renderCandidateEmbeddingText(candidate: Candidate): string {
  const parts: string[] = [];

  const headline = candidate.currentPosition ?? candidate.classifiedRoles[0] ?? null;
  const latestDescription = candidate.workHistory.find((entry) => !!entry.description)?.description;
  if (headline) {
    let summary = `Core profile: ${headline}`;
    if (latestDescription) {
      summary += ` - Core tasks: ${truncate(latestDescription, EMBEDDING_TEXT_LIMITS.coreTaskChars)}`;
    }
    parts.push(summary);
  }

  if (candidate.classifiedRoles.length > 0) {
    parts.push(`Roles: ${candidate.classifiedRoles.join(', ')}`);
  }
  if (candidate.currentCompany) {
    parts.push(`Current company: ${candidate.currentCompany}`);
  }

  if (candidate.workHistory.length > 0) {
    const lines = ['Work history:'];
    for (const entry of candidate.workHistory) {
      lines.push(`- ${formatRole(entry)}`);
      if (entry.description) {
        lines.push(`  Tasks: ${entry.description}`);
      }
    }
    parts.push(lines.join('\n'));
  }

  const education = candidate.education.map(formatEducation).filter((line): line is string => line !== null);
  if (education.length > 0) {
    parts.push(['Education:', ...education.map((line) => `- ${line}`)].join('\n'));
  }

  if (candidate.furtherEducation.length > 0) {
    parts.push(
      ['Further education:', ...candidate.furtherEducation.map((entry) => `- ${formatFurtherEducation(entry)}`)].join(
        '\n'
      )
    );
  }

  if (candidate.skills.length > 0) {
    parts.push(`Skills: ${candidate.skills.join(', ')}`);
  }
  if (candidate.itSkills.length > 0) {
    parts.push(`IT skills: ${candidate.itSkills.join(', ')}`);
  }
  if (candidate.languages.length > 0) {
    parts.push(`Languages: ${candidate.languages.map(formatLanguage).join(', ')}`);
  }

  if (candidate.workHistory.length === 0 && candidate.cvText) {
    parts.push(`CV:\n${truncate(candidate.cvText, EMBEDDING_TEXT_LIMITS.cvFallbackChars)}`);
  }

  return parts.join('\n\n');
}

export function renderJobEmbeddingText(job: Job): string {
  const parts: string[] = [];

  if (job.position) {
    let summary = `Wanted: ${job.position}`;
    if (job.jobText) {
      summary += ` - Requirements: ${truncate(job.jobText, EMBEDDING_TEXT_LIMITS.coreTaskChars)}`;
    }
    parts.push(summary);
  }
  if (job.classifiedRoles.length > 0) {
    parts.push(`Roles: ${job.classifiedRoles.join(', ')}`);
  }
  if (job.industry) {
    parts.push(`Industry: ${job.industry}`);
  }
  if (job.employmentType) {
    parts.push(`Employment type: ${job.employmentType}`);
  }
  if (job.jobText) {
    parts.push(`Job description:\n${job.jobText}`);
  }

  return parts.join('\n\n');
}

// =============================================================================
// EVALUATION SECTIONS (untruncated)
// =============================================================================

const NOT_SPECIFIED = 'Not specified';

export function renderJobEvaluationSection(job: Job): string {
  const lines = [
    '=== POSITION ===',
    `Position: ${job.position}`,
    `Company: ${job.companyName}`,
    `Industry: ${job.industry ?? NOT_SPECIFIED}`,
    `Location: ${job.city ?? NOT_SPECIFIED}`,
    `Work arrangement: ${job.workArrangement ?? job.profile?.workArrangement ?? NOT_SPECIFIED}`,
    `Category: ${job.category ?? NOT_SPECIFIED}`,
    `Classified roles: ${job.classifiedRoles.length > 0 ? job.classifiedRoles.join(', ') : 'Not classified'}`,
  ];

  if (job.profile) {
    lines.push('', ...renderJobProfileSummary(job.profile));
  }

  lines.push('', 'Job description:', job.jobText ?? 'No job description available');
  return lines.join('\n');
}

export function renderCandidateEvaluationSection(candidate: Candidate): string {
  const workLines: string[] = [];
  candidate.workHistory.forEach((entry, index) => {
    workLines.push(
      '',
      `--- Role ${index + 1} ---`,
      `Position: ${entry.position}`,
      `Company: ${entry.company ?? 'Unknown company'}`,
      `Period: ${entry.startDate ?? '?'} to ${entry.endDate ?? 'present'}`
    );
    if (entry.description) {
      workLines.push(`Tasks:\n${entry.description}`);
    }
  });

  const education = candidate.education.map(formatEducation).filter((line): line is string => line !== null);
  const furtherEducation = candidate.furtherEducation.map(formatFurtherEducation);

  const lines = [
    '=== CANDIDATE ===',
    `Current position: ${candidate.currentPosition ?? NOT_SPECIFIED}`,
    `Current company: ${candidate.currentCompany ?? NOT_SPECIFIED}`,
    `Location: ${candidate.city ?? NOT_SPECIFIED}`,
    `Classified roles: ${candidate.classifiedRoles.length > 0 ? candidate.classifiedRoles.join(', ') : 'Not classified'}`,
    '',
    `Skills: ${candidate.skills.length > 0 ? candidate.skills.join(', ') : 'None listed'}`,
    `IT skills: ${candidate.itSkills.length > 0 ? candidate.itSkills.join(', ') : 'None listed'}`,
    `ERP systems: ${candidate.erp.length > 0 ? candidate.erp.join(', ') : 'None listed'}`,
    `Languages: ${candidate.languages.length > 0 ? candidate.languages.map(formatLanguage).join(', ') : 'None listed'}`,
  ];

  if (candidate.profile) {
    lines.push('', ...renderCandidateProfileSummary(candidate.profile));
  }

  lines.push(
    '',
    'Work history (newest first):',
    workLines.length > 0 ? workLines.join('\n') : 'No work history available',
    '',
    'Education:',
    education.length > 0 ? education.map((line) => `- ${line}`).join('\n') : 'None listed',
    '',
    'Further education / certificates:',
    furtherEducation.length > 0 ? furtherEducation.map((line) => `- ${line}`).join('\n') : 'None listed'
  );

  if (workLines.length === 0 && candidate.cvText) {
    lines.push('', 'Full CV text (no structured work history):', candidate.cvText);
  }

  return lines.join('\n');
}

function renderCandidateProfileSummary(profile: CandidateProfile): string[] {
  const lines = [
    `Extracted profile: level ${profile.seniorityLevel} (${SENIORITY_LABELS[profile.seniorityLevel]}), ` +
      `${profile.trajectory} trajectory, ${profile.yearsExperience} years relevant experience`,
    `Summary: ${profile.summary}`,
  ];
  if (profile.structuredSkills.length > 0) {
    lines.push(
      `Key skills: ${profile.structuredSkills
        .map((skill) => `${skill.skill} (${skill.proficiency}${skill.recency ? `, ${skill.recency}` : ''})`)
        .join(', ')}`
    );
  }
  if (profile.certifications.length > 0) {
    lines.push(`Certifications: ${profile.certifications.join(', ')}`);
  }
  return lines;
}

function renderJobProfileSummary(profile: JobProfile): string[] {
  const lines = [
    `Extracted profile: level ${profile.seniorityLevel} (${SENIORITY_LABELS[profile.seniorityLevel]})`,
    `Summary: ${profile.summary}`,
  ];
  if (profile.structuredSkills.length > 0) {
    lines.push(
      `Required skills: ${profile.structuredSkills.map((skill) => `${skill.skill} (${skill.importance})`).join(', ')}`
    );
  }
  if (profile.requiredCertifications.length > 0) {
    lines.push(
      `Required certifications: ${profile.requiredCertifications
        .map((cert) => `${cert.name} (${cert.importance})`)
        .join(', ')}`
    );
  }
  return lines;
}
