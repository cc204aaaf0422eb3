import {
  QuickSightClient,
  TagResourceCommand,
  ListTagsForResourceCommand,
} from '@aws-sdk/client-quicksight';
import { logger } from '../utils/logger';
import { getErrorFields } from '../utils/awsRetry';
import { MissingPermissionError, ValidationError } from '../utils/errors';

export interface AssetTag {
  Key: string;
  Value: string;
}

export class TagService {
  constructor(private readonly client: QuickSightClient) {}

  async getResourceTags(resourceArn: string): Promise<AssetTag[]> {
    const response = await this.client.send(new ListTagsForResourceCommand({
      ResourceArn: resourceArn,
    }));

    const tags: AssetTag[] = [];
    for (const tag of response.Tags || []) {
      if (tag.Key !== undefined) {
        tags.push({ Key: tag.Key, Value: tag.Value ?? '' });
      }
    }
    return tags;
  }

  async tagResource(resourceArn: string, tags: AssetTag[]): Promise<void> {
    if (tags.length === 0) {
      return;
    }

    try {
      await this.client.send(new TagResourceCommand({
        ResourceArn: resourceArn,
        Tags: tags,
      }));
      logger.debug(`Tagged ${resourceArn} with ${tags.length} tags`);
    } catch (error) {
      const { name } = getErrorFields(error);
      if (name === 'AccessDeniedException') {
        throw new MissingPermissionError(`No permission to tag ${resourceArn}. Please ensure your IAM role has quicksight:TagResource permission.`, { cause: error });
      }
      if (name === 'InvalidParameterValueException') {
        throw new ValidationError('Invalid tag format. Keys and values must follow AWS tagging rules.', { cause: error });
      }
      throw error;
    }
  }
}
