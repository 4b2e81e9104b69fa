import { Test, TestingModule } from '@nestjs/testing';
import { Logger } from '@nestjs/common';
import {
  GetParameterCommand,
  GetParametersByPathCommand,
  SSMClient,
} from '@aws-sdk/client-ssm';
import { ParameterStoreFetcherService } from './parameter-store-fetcher.service';
import { HOST_VARS_CONFIG } from '../constants';
import { ModuleOptions } from '../interface';

// Mock the AWS SDK
jest.mock('@aws-sdk/client-ssm');

describe('ParameterStoreFetcherService', () => {
  let mockSend: jest.Mock;
  let loggerWarnSpy: jest.SpyInstance;

  const parameterPath = '/aws_vars/mysql/ansible_vars';

  const createService = async (
    config: ModuleOptions,
  ): Promise<ParameterStoreFetcherService> => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ParameterStoreFetcherService,
        { provide: HOST_VARS_CONFIG, useValue: config },
      ],
    }).compile();

    return module.get<ParameterStoreFetcherService>(
      ParameterStoreFetcherService,
    );
  };

  const notFoundError = (): Error => {
    const error = new Error('Parameter not found');
    error.name = 'ParameterNotFound';
    return error;
  };

  beforeEach(() => {
    // Clear all mocks before each test
    jest.clearAllMocks();

    // Create mock send function
    mockSend = jest.fn();

    // Mock the SSMClient constructor
    (SSMClient as jest.Mock).mockImplementation(() => ({
      send: mockSend,
    }));

    jest.spyOn(Logger.prototype, 'log').mockImplementation();
    jest.spyOn(Logger.prototype, 'debug').mockImplementation();
    loggerWarnSpy = jest.spyOn(Logger.prototype, 'warn').mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('construction', () => {
    it('should create one SSM client for the configured region', async () => {
      const service = await createService({ awsRegion: 'eu-west-1' });

      expect(service).toBeDefined();
      expect(SSMClient).toHaveBeenCalledTimes(1);
      expect(SSMClient).toHaveBeenCalledWith({ region: 'eu-west-1' });
    });

    it('should fail when the region is missing', async () => {
      await expect(createService({})).rejects.toThrow(
        'AWS region is required',
      );
    });
  });

  describe('fetch (parameter mode)', () => {
    let service: ParameterStoreFetcherService;

    beforeEach(async () => {
      service = await createService({ awsRegion: 'us-east-1' });
    });

    it('should return the payload of an existing parameter', async () => {
      mockSend.mockResolvedValue({
        Parameter: {
          Name: parameterPath,
          Value: '{"mysql_port":3306}',
          Type: 'SecureString',
        },
      });

      const result = await service.fetch(parameterPath);

      expect(result).toEqual({
        status: 'found',
        name: parameterPath,
        payload: '{"mysql_port":3306}',
      });
      expect(GetParameterCommand).toHaveBeenCalledWith({
        Name: parameterPath,
        WithDecryption: true,
      });
      expect(mockSend).toHaveBeenCalledWith(expect.any(GetParameterCommand));
    });

    it('should map ParameterNotFound to not-found', async () => {
      mockSend.mockRejectedValue(notFoundError());

      const result = await service.fetch(parameterPath);

      expect(result).toEqual({ status: 'not-found' });
      expect(loggerWarnSpy).not.toHaveBeenCalled();
    });

    it('should treat a parameter without value as not-found', async () => {
      mockSend.mockResolvedValue({ Parameter: { Name: parameterPath } });

      const result = await service.fetch(parameterPath);

      expect(result).toEqual({ status: 'not-found' });
    });

    it('should return an error result for AccessDeniedException', async () => {
      const error = new Error('User is not authorized');
      error.name = 'AccessDeniedException';
      mockSend.mockRejectedValue(error);

      const result = await service.fetch(parameterPath);

      expect(result.status).toBe('error');
      expect(result).toHaveProperty(
        'detail',
        expect.stringContaining('Access Denied'),
      );
      expect(loggerWarnSpy).toHaveBeenCalledWith(
        expect.stringContaining(`Path: '${parameterPath}'`),
      );
    });

    it('should return an error result for network failures', async () => {
      mockSend.mockRejectedValue(
        Object.assign(new Error('connect ETIMEDOUT'), { code: 'ETIMEDOUT' }),
      );

      const result = await service.fetch(parameterPath);

      expect(result).toHaveProperty(
        'detail',
        expect.stringContaining('Network error'),
      );
    });

    it('should reject relative paths without calling AWS', async () => {
      const result = await service.fetch('aws_vars/ansible_vars');

      expect(result).toEqual({
        status: 'error',
        detail: expect.stringContaining(
          "Parameter Store path must start with '/'",
        ),
      });
      expect(mockSend).not.toHaveBeenCalled();
    });
  });

  describe('fetch (path mode)', () => {
    let service: ParameterStoreFetcherService;

    beforeEach(async () => {
      service = await createService({
        awsRegion: 'us-east-1',
        fetchMode: 'path',
      });
    });

    it('should find the parameter under its parent path', async () => {
      mockSend.mockResolvedValue({
        Parameters: [
          { Name: '/aws_vars/mysql/notes', Value: 'ignored' },
          { Name: parameterPath, Value: '{"mysql_port":3306}' },
        ],
      });

      const result = await service.fetch(parameterPath);

      expect(result).toEqual({
        status: 'found',
        name: parameterPath,
        payload: '{"mysql_port":3306}',
      });
      expect(GetParametersByPathCommand).toHaveBeenCalledWith({
        Path: '/aws_vars/mysql',
        Recursive: false,
        WithDecryption: true,
      });
    });

    it('should follow pagination until the parameter is found', async () => {
      mockSend
        .mockResolvedValueOnce({
          Parameters: [{ Name: '/aws_vars/mysql/other', Value: 'x' }],
          NextToken: 'token-page-2',
        })
        .mockResolvedValueOnce({
          Parameters: [{ Name: parameterPath, Value: '{"a":1}' }],
          NextToken: 'token-page-3',
        });

      const result = await service.fetch(parameterPath);

      expect(result).toEqual({
        status: 'found',
        name: parameterPath,
        payload: '{"a":1}',
      });
      expect(mockSend).toHaveBeenCalledTimes(2);
      expect(GetParametersByPathCommand).toHaveBeenLastCalledWith({
        Path: '/aws_vars/mysql',
        Recursive: false,
        WithDecryption: true,
        NextToken: 'token-page-2',
      });
    });

    it('should return not-found when no page holds the exact name', async () => {
      mockSend
        .mockResolvedValueOnce({
          Parameters: [
            { Name: `${parameterPath}/nested`, Value: '{"a":1}' },
          ],
          NextToken: 'token-page-2',
        })
        .mockResolvedValueOnce({ Parameters: [] });

      const result = await service.fetch(parameterPath);

      expect(result).toEqual({ status: 'not-found' });
      expect(mockSend).toHaveBeenCalledTimes(2);
    });

    it('should return an error result when a page fails', async () => {
      const error = new Error('Rate exceeded');
      error.name = 'ThrottlingException';
      mockSend.mockRejectedValue(error);

      const result = await service.fetch(parameterPath);

      expect(result).toHaveProperty(
        'detail',
        expect.stringContaining('Request throttled'),
      );
    });
  });

  describe('fetch mode equivalence', () => {
    it('should report the same outcome in both modes', async () => {
      const stored = { Name: parameterPath, Value: '{"max_conn":100}' };

      mockSend.mockResolvedValue({ Parameter: stored });
      const byName = await (
        await createService({ awsRegion: 'us-east-1' })
      ).fetch(parameterPath);

      mockSend.mockResolvedValue({ Parameters: [stored] });
      const byPath = await (
        await createService({ awsRegion: 'us-east-1', fetchMode: 'path' })
      ).fetch(parameterPath);

      expect(byPath).toEqual(byName);
    });
  });
});
