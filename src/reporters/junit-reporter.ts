import type { TestReport, TestResult } from '../types.js';
import { failureReason } from './report.js';

type XMLEntry = {
  name: string;
  attributes?: { [name: string]: string | number };
  children?: XMLEntry[];
};

const SUITES_NAME = 'Interspace V2 API Tests';
const SUITE_NAME = 'V2 API';

export function renderJUnit(report: TestReport): string {
  const summary = {
    tests: report.totalTests,
    failures: report.failed,
    time: formatTime(report.duration),
  };
  const root: XMLEntry = {
    name: 'testsuites',
    attributes: { name: SUITES_NAME, ...summary },
    children: [
      {
        name: 'testsuite',
        attributes: { name: SUITE_NAME, ...summary },
        children: report.allTests.map(buildTestCase),
      },
    ],
  };

  const tokens: string[] = ['<?xml version="1.0" encoding="UTF-8"?>'];
  serializeXML(root, tokens, 0);
  return tokens.join('\n');
}

function buildTestCase(result: TestResult): XMLEntry {
  const entry: XMLEntry = {
    name: 'testcase',
    attributes: {
      name: result.name,
      classname: result.category,
      time: formatTime(result.executionTime),
    },
  };
  if (!result.success) {
    entry.children = [
      {
        name: 'failure',
        attributes: { message: failureReason(result), type: 'AssertionError' },
      },
    ];
  }
  return entry;
}

function serializeXML(entry: XMLEntry, tokens: string[], depth: number) {
  const indent = '  '.repeat(depth);
  const attrs: string[] = [];
  for (const [name, value] of Object.entries(entry.attributes || {}))
    attrs.push(`${name}="${escape(String(value))}"`);
  const open = `${indent}<${entry.name}${attrs.length ? ' ' : ''}${attrs.join(' ')}`;

  const children = entry.children || [];
  if (!children.length) {
    tokens.push(`${open}/>`);
    return;
  }
  tokens.push(`${open}>`);
  for (const child of children) serializeXML(child, tokens, depth + 1);
  tokens.push(`${indent}</${entry.name}>`);
}

// See https://en.wikipedia.org/wiki/Valid_characters_in_XML
const discouragedXMLCharacters =
  /[\u0000-\u0008\u000b-\u000c\u000e-\u001f\u007f-\u0084\u0086-\u009f]/g;

const XML_ENTITIES: Record<string, string> = {
  '&': '&amp;',
  '"': '&quot;',
  "'": '&apos;',
  '<': '&lt;',
  '>': '&gt;',
  '\t': '&#9;',
  '\n': '&#10;',
  '\r': '&#13;',
};

// Every escaped value is an attribute: tabs and line breaks stay as
// character references.
function escape(text: string): string {
  return text
    .replace(/[&"'<>\t\n\r]/g, (c) => XML_ENTITIES[c] ?? c)
    .replace(discouragedXMLCharacters, '');
}

function formatTime(seconds: number): string {
  return seconds.toFixed(3);
}
