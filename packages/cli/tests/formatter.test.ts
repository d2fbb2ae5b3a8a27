import { describe, it, expect } from 'vitest';
import type { RemoteTool, ToolCallRequest } from '@lingshu/shared';
import {
  formatPayload,
  formatRejection,
  formatReply,
  formatToolCall,
  formatToolList,
  formatToolResult,
} from '../src/output/formatter.js';

const qaTool: RemoteTool = {
  name: 'medical_qa',
  description: 'Answer a medical question',
  inputSchema: {
    type: 'object',
    properties: {
      question: { type: 'string', description: 'The medical question' },
      specialty: { type: 'string', default: 'general' },
    },
    required: ['question'],
  },
};

const call: ToolCallRequest = { id: 'call_1', name: 'medical_qa', arguments: '{"question":"Why?"}' };

describe('Formatting utilities', () => {
  it('lists tools with their parameters', () => {
    expect(formatToolList([qaTool])).toBe(
      [
        'Available tools (1):',
        '',
        '  medical_qa',
        '    Answer a medical question',
        '    question (string, required) - The medical question',
        '    specialty (string, default "general")',
      ].join('\n'),
    );
  });

  it('handles an empty tool list', () => {
    expect(formatToolList([])).toBe('Available tools (0):');
  });

  it('prints strings as-is and everything else as indented JSON', () => {
    expect(formatPayload('plain text')).toBe('plain text');
    expect(formatPayload({ status: 'success' })).toBe('{\n  "status": "success"\n}');
  });

  it('formats a tool call with its arguments', () => {
    expect(formatToolCall(call, { question: 'Why?' })).toBe(
      'Calling tool: medical_qa\nArguments: {\n  "question": "Why?"\n}',
    );
  });

  it('formats results, rejections and replies', () => {
    expect(formatToolResult({ status: 'error', error: 'No question provided' })).toBe(
      'Tool result:\n{\n  "status": "error",\n  "error": "No question provided"\n}',
    );
    expect(formatRejection(call, 'Tool not found: x')).toBe('[REJECTED] medical_qa: Tool not found: x');
    expect(formatReply('Nodules under 6 mm rarely need follow-up.')).toBe(
      'Direct response:\nNodules under 6 mm rarely need follow-up.',
    );
  });
});
