import fs from 'fs';
import type { FileHandle } from 'fs/promises';

import { ADGUARD_DNS_SERVER_CONFIG, DEFAULT_TEMPLATE } from './constants.ts';
import { HeadFileError } from './errors.ts';

type AdguardDnsState = 'activated' | 'deactivated';

type HeadFile = FileHandle;

/**
 * Creates the head file, or truncates it when it already exists.
 */
const openHeadFile = async (headPath: string): Promise<HeadFile> => {
  try {
    return await fs.promises.open(headPath, 'w');
  } catch (e) {
    throw new HeadFileError(`failed to create ${headPath}`, { cause: e });
  }
};

const renderHeadTemplate = (state: AdguardDnsState): string =>
  state === 'activated'
    ? `${DEFAULT_TEMPLATE} ${ADGUARD_DNS_SERVER_CONFIG}`
    : DEFAULT_TEMPLATE;

const writeHeadTemplate = async (
  headFile: HeadFile,
  state: AdguardDnsState
): Promise<void> => {
  try {
    await headFile.writeFile(renderHeadTemplate(state), {
      encoding: 'utf-8'
    });
  } catch (e) {
    throw new HeadFileError('failed to write default template', { cause: e });
  }
};

export {
  type AdguardDnsState,
  type HeadFile,
  openHeadFile,
  renderHeadTemplate,
  writeHeadTemplate
};
