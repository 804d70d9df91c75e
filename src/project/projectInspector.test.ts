import { describe, it, expect } from 'vitest';
import { mkdirSync, mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { ProjectError } from '../errors.js';
import { createProjectInspector, parseGoModulePath } from './projectInspector.js';

function scaffold(files: Record<string, string>): string {
  const dir = mkdtempSync(join(tmpdir(), 'opbuild-project-'));
  for (const [rel, content] of Object.entries(files)) {
    const p = join(dir, rel);
    mkdirSync(join(p, '..'), { recursive: true });
    writeFileSync(p, content, 'utf8');
  }
  return dir;
}

describe('parseGoModulePath', () => {
  it('reads the module directive', () => {
    expect(parseGoModulePath('module example.com/app-operator\n\ngo 1.22\n')).toBe('example.com/app-operator');
  });

  it('accepts quoted paths and trailing comments', () => {
    expect(parseGoModulePath('module "example.com/q" // main module\n')).toBe('example.com/q');
  });

  it('returns undefined without a directive', () => {
    expect(parseGoModulePath('go 1.22\n')).toBeUndefined();
  });
});

describe('createProjectInspector', () => {
  it('accepts a directory with build/Dockerfile', () => {
    const dir = scaffold({ 'build/Dockerfile': 'FROM scratch\n' });
    expect(() => createProjectInspector(dir).mustInProjectRoot()).not.toThrow();
  });

  it('rejects a directory without build/Dockerfile', () => {
    const dir = scaffold({ 'README.md': '# app\n' });
    expect(() => createProjectInspector(dir).mustInProjectRoot()).toThrow(ProjectError);
  });

  it('detects a Go manager', () => {
    const goDir = scaffold({ 'cmd/manager/main.go': 'package main\n' });
    const helmDir = scaffold({ 'helm-charts/app/Chart.yaml': 'name: app\n' });
    expect(createProjectInspector(goDir).isGoProject()).toBe(true);
    expect(createProjectInspector(helmDir).isGoProject()).toBe(false);
  });

  it('reports the absolute root and module path', () => {
    const dir = scaffold({ 'go.mod': 'module example.com/app-operator\n' });
    const inspector = createProjectInspector(dir);
    expect(inspector.projectRoot()).toBe(dir);
    expect(inspector.goPackage()).toBe('example.com/app-operator');
  });

  it('fails without go.mod', () => {
    const dir = scaffold({});
    expect(() => createProjectInspector(dir).goPackage()).toThrow(/go\.mod not found/);
  });
});
