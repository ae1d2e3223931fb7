/**
 * Tests for registry preconditions
 * Donation Registry
 */

import {
  checkAmountPositive,
  checkCallerIsCreator,
  checkCallerIsNotCreator,
  checkDescription,
  checkMessage,
  checkName,
  checkProjectExists,
} from '../guards';
import { EMPTY_PROJECT } from '../../database/repositories/ProjectRepository';
import {
  IllegalCallerError,
  IncorrectStringFormatError,
  InsufficientFundsError,
  ProjectExistedError,
} from '../../utils/errors';
import { Address, Project } from '../../types/global';

const CREATOR: Address = '0x1111111111111111111111111111111111111111';
const DONOR: Address = '0x2222222222222222222222222222222222222222';

const project: Project = {
  id: '0x1a8ca51e1af01efc23694892a98aab858a7a5c96513ad2110175b7ecf9412e58',
  creator: CREATOR,
  name: 'Project Name',
  createTime: 1700000000,
};

describe('string bounds', () => {
  it('accepts names between 1 and 64 bytes', () => {
    expect(() => checkName('a')).not.toThrow();
    expect(() => checkName('a'.repeat(64))).not.toThrow();
  });

  it('rejects empty and oversized names', () => {
    expect(() => checkName('')).toThrow(IncorrectStringFormatError);
    expect(() => checkName('a'.repeat(65))).toThrow(IncorrectStringFormatError);
  });

  it('counts bytes rather than characters', () => {
    // 32 × 2 octets
    expect(() => checkName('é'.repeat(32))).not.toThrow();
    expect(() => checkName('é'.repeat(33))).toThrow(IncorrectStringFormatError);
  });

  it('accepts an empty description and rejects one over 1024 bytes', () => {
    expect(() => checkDescription('')).not.toThrow();
    expect(() => checkDescription('d'.repeat(1024))).not.toThrow();
    expect(() => checkDescription('d'.repeat(1025))).toThrow(IncorrectStringFormatError);
  });

  it('bounds donation messages to 256 bytes', () => {
    expect(() => checkMessage('')).not.toThrow();
    expect(() => checkMessage('m'.repeat(256))).not.toThrow();
    expect(() => checkMessage('m'.repeat(257))).toThrow(IncorrectStringFormatError);
  });

  it('reports the offending value', () => {
    let caught: unknown;
    try {
      checkName('');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(IncorrectStringFormatError);
    expect(caught).toMatchObject({ value: '', context: { value: '', min: 1, max: 64 } });
  });
});

describe('checkAmountPositive', () => {
  it('rejects zero and negative amounts', () => {
    expect(() => checkAmountPositive(0n)).toThrow(InsufficientFundsError);
    expect(() => checkAmountPositive(-1n)).toThrow(InsufficientFundsError);
  });

  it('accepts positive amounts', () => {
    expect(() => checkAmountPositive(1n)).not.toThrow();
  });
});

describe('caller guards', () => {
  it('only lets the creator act as creator', () => {
    expect(() => checkCallerIsCreator(project, CREATOR)).not.toThrow();
    expect(() => checkCallerIsCreator(project, DONOR)).toThrow(IllegalCallerError);
  });

  it('refuses the creator as donor', () => {
    expect(() => checkCallerIsNotCreator(project, DONOR)).not.toThrow();
    expect(() => checkCallerIsNotCreator(project, CREATOR)).toThrow(IllegalCallerError);
  });
});

describe('checkProjectExists', () => {
  it('treats the empty record as a missing project', () => {
    expect(() => checkProjectExists(EMPTY_PROJECT, project.id)).toThrow(ProjectExistedError);
    expect(() => checkProjectExists(project, project.id)).not.toThrow();
  });
});
