import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { CvDocument, RenderResult } from '../src/domain/types.js';
import type { RenderGateway } from '../src/services/renderGateway.js';
import { createEmptyDocument } from '../src/services/documentModel.js';

export function sampleCv(): CvDocument {
  return {
    ...createEmptyDocument(),
    name: 'Jane Doe',
    email: 'jane@example.com',
    sections: {
      experience: [
        {
          _id: 'entry_exp1',
          _kind: 'ExperienceEntry',
          company: 'Acme',
          position: 'Engineer',
          location: '',
          highlights: ['Shipped the API', 'Led a team'],
        },
      ],
      skills: [
        {
          _id: 'entry_skill1',
          _kind: 'OneLineEntry',
          label: 'Languages',
          details: 'TypeScript, Go',
        },
      ],
    },
  };
}

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export class FakeGateway implements RenderGateway {
  readonly mode = 'local' as const;

  readonly received: string[] = [];

  constructor(
    private readonly result: RenderResult,
    private readonly healthy = true,
  ) {}

  async render(yamlText: string): Promise<RenderResult> {
    this.received.push(yamlText);
    return this.result;
  }

  async healthCheck(): Promise<boolean> {
    return this.healthy;
  }
}
