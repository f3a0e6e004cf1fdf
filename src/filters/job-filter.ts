import { RawPosting } from '../types/job';
import { ExperienceWindow } from '../config';
import { JobFamilyDefinition } from '../config/job-families';
import { descriptionMatchesExperience } from './experience';
import { hasRequiredSkills } from './skill-matcher';
import { logger } from '../utils/logger';

export type FilterRejection = 'experience' | 'skills';

/**
 * Per-family posting filter
 * Experience window always applies; the skill gate only when the family has one
 */
export class JobFilter {
  constructor(
    private window: ExperienceWindow,
    private skillGate?: JobFamilyDefinition['skillGate']
  ) {}

  /**
   * Returns the reason a posting is rejected, or null when it passes
   */
  rejectionReason(posting: RawPosting): FilterRejection | null {
    if (!descriptionMatchesExperience(posting.description, this.window)) {
      logger.debug(`Posting filtered out: experience out of range`, { job: posting.title });
      return 'experience';
    }

    if (
      this.skillGate &&
      !hasRequiredSkills(posting.description, this.skillGate.keywords, this.skillGate.minMatches)
    ) {
      logger.debug(`Posting filtered out: not enough skill keywords`, { job: posting.title });
      return 'skills';
    }

    return null;
  }
}
