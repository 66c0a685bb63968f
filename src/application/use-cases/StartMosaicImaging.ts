import type { ILogger } from '../../domain/ports/ILogger.js';
import type { ImagingParams, MosaicParams } from '../../domain/entities/TelescopeState.js';
import type { GotoTarget, GotoTargetOutput } from './GotoTarget.js';
import type { ImagingOutput, StartImaging } from './StartImaging.js';
import { validateImagingParams } from './StartImaging.js';

export interface StartMosaicImagingInput extends Omit<ImagingParams, 'mosaic'> {
  targetName: string;
  mosaic: MosaicParams;
  skipVisibilityCheck?: boolean;
}

export interface StartMosaicImagingOutput extends ImagingOutput {
  goto: GotoTargetOutput;
}

/**
 * Use case for framing a target wider than one field: goto in mosaic mode,
 * then stack with the same mosaic layout.
 */
export class StartMosaicImaging {
  constructor(
    private readonly gotoTarget: GotoTarget,
    private readonly startImaging: StartImaging,
    private readonly logger: ILogger
  ) {}

  async execute(input: StartMosaicImagingInput): Promise<StartMosaicImagingOutput> {
    const { targetName, skipVisibilityCheck, ...imaging } = input;
    validateImagingParams(imaging);

    this.logger.info('Executing StartMosaicImaging use case', { targetName, mosaic: input.mosaic });
    const goto = await this.gotoTarget.execute({
      name: targetName,
      mosaic: input.mosaic,
      skipVisibilityCheck,
    });
    const started = await this.startImaging.execute(imaging);

    return {
      ...started,
      message: `Started mosaic imaging of ${goto.target.name} (${input.mosaic.width}x${input.mosaic.height})`,
      goto,
    };
  }
}
