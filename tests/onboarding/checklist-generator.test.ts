import fs from 'fs';
import path from 'path';
import { ChecklistGenerator, buildChecklist, checklistFileName } from '../../src/onboarding/checklist/checklist-generator';
import { NOW, makeEmployee, makeTempDir, removeDir, silentLogger } from './helpers';

describe('checklistFileName', () => {
  it('should lower-case the name and replace every space', () => {
    expect(checklistFileName('Ada Lovelace')).toBe('checklist_ada_lovelace.json');
    expect(checklistFileName('Mary Ann Evans')).toBe('checklist_mary_ann_evans.json');
  });
});

describe('buildChecklist', () => {
  it('should list the six tasks in order with their owners', () => {
    const checklist = buildChecklist(makeEmployee(), {}, NOW);

    expect(checklist).toEqual({
      employee: 'Ada Lovelace',
      created: NOW.toISOString(),
      tasks: [
        { task: 'Send welcome email', status: 'completed', owner: 'HR' },
        { task: 'Prepare workspace', status: 'pending', owner: 'Facilities' },
        { task: 'Setup IT accounts', status: 'pending', owner: 'IT' },
        { task: 'Schedule first day meeting', status: 'pending', owner: 'Charles Babbage' },
        { task: 'Assign buddy/mentor', status: 'pending', owner: 'HR' },
        { task: 'Order business cards', status: 'pending', owner: 'Marketing' }
      ]
    });
  });

  it('should leave the welcome email pending when it was not sent', () => {
    const checklist = buildChecklist(makeEmployee(), { welcomeEmailSent: false }, NOW);

    expect(checklist.tasks[0]).toEqual({ task: 'Send welcome email', status: 'pending', owner: 'HR' });
    expect(checklist.tasks.filter(task => task.status === 'completed')).toHaveLength(0);
  });
});

describe('ChecklistGenerator', () => {
  let outputDir: string;

  beforeEach(() => {
    outputDir = makeTempDir();
  });

  afterEach(() => {
    removeDir(outputDir);
  });

  it('should write the checklist as pretty-printed JSON', () => {
    const generator = new ChecklistGenerator(outputDir, silentLogger(), () => NOW);

    const checklist = generator.createOnboardingChecklist(makeEmployee());

    const filePath = path.join(outputDir, 'checklist_ada_lovelace.json');
    const content = fs.readFileSync(filePath, 'utf8');
    expect(content).toBe(JSON.stringify(checklist, null, 2));
    expect(JSON.parse(content)).toEqual(checklist);
  });

  it('should overwrite the file of an employee with the same normalised name', () => {
    const generator = new ChecklistGenerator(outputDir, silentLogger(), () => NOW);

    generator.createOnboardingChecklist(makeEmployee({ manager: 'First Manager' }));
    generator.createOnboardingChecklist(makeEmployee({ name: 'ada lovelace', manager: 'Second Manager' }));

    const saved = JSON.parse(fs.readFileSync(path.join(outputDir, 'checklist_ada_lovelace.json'), 'utf8'));
    expect(saved.employee).toBe('ada lovelace');
    expect(saved.tasks[3].owner).toBe('Second Manager');
    expect(fs.readdirSync(outputDir)).toEqual(['checklist_ada_lovelace.json']);
  });

  it('should throw when the file cannot be written', () => {
    const generator = new ChecklistGenerator(path.join(outputDir, 'missing'), silentLogger(), () => NOW);

    expect(() => generator.createOnboardingChecklist(makeEmployee())).toThrow(/ENOENT/);
  });
});
