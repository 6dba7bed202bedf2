import { describeError, type ResultRecord } from '@reqtrace/core';

import { parseJUnitStream } from './adapters/junit';
import type { ParseResult } from './types';

export const importJUnitXml = async (filePath: string): Promise<ParseResult<ResultRecord[]>> => {
  try {
    return await parseJUnitStream(filePath);
  } catch (error) {
    const message = describeError(error);
    return { data: [], warnings: [message] };
  }
};
