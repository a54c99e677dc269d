import fs from 'fs';
import path from 'path';
import { runDemo, sampleEmployee } from '../../src/onboarding/demo';
import { OnboardingLogger } from '../../src/onboarding/utils/logger';
import { NOW, makeTempDir, removeDir } from './helpers';

describe('sampleEmployee', () => {
  it('should start three days from now', () => {
    expect(sampleEmployee(NOW)).toEqual({
      name: 'John Doe',
      email: 'john.doe@company.com',
      department: 'Engineering',
      startDate: '2026-10-21',
      manager: 'Jane Smith'
    });
  });
});

describe('runDemo', () => {
  let outputDir: string;

  beforeEach(() => {
    outputDir = makeTempDir();
  });

  afterEach(() => {
    removeDir(outputDir);
  });

  it('should write the checklist, metrics and log files only', () => {
    const logger = new OnboardingLogger({
      consoleOutput: false,
      fileOutput: true,
      filePath: path.join(outputDir, 'onboarding.log')
    });

    const result = runDemo({ outputDir, logger, now: () => NOW });

    expect(result.emailBody).toContain('<h2>Welcome to Our Team, John Doe!</h2>');
    expect(result.checklist.tasks[3].owner).toBe('Jane Smith');
    expect(result.metrics.success_rate).toBe(1);
    expect(result.files).toEqual([
      path.join(outputDir, 'onboarding.log'),
      path.join(outputDir, 'checklist_john_doe.json'),
      path.join(outputDir, 'workflow_metrics.json')
    ]);
    expect(fs.readdirSync(outputDir).sort()).toEqual([
      'checklist_john_doe.json',
      'onboarding.log',
      'workflow_metrics.json'
    ]);
  });

  it('should create a missing output directory', () => {
    const nestedDir = path.join(outputDir, 'demo', 'output');

    const result = runDemo({ outputDir: nestedDir, logger: new OnboardingLogger({ consoleOutput: false }), now: () => NOW });

    expect(fs.existsSync(result.files[1])).toBe(true);
    expect(fs.readdirSync(nestedDir).sort()).toEqual(['checklist_john_doe.json', 'workflow_metrics.json']);
  });
});
