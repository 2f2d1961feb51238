import { ConflictException, InternalServerErrorException, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { AddStreamerDto } from './dto/add-streamer.dto';
import { NowLiveController } from './now-live.controller';
import { NowLiveService, UserManagementResult } from './now-live.service';

describe('NowLiveController', () => {
  let controller: NowLiveController;

  const mockNowLiveService = {
    getUsers: jest.fn(),
    addUser: jest.fn(),
    removeUser: jest.fn(),
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [NowLiveController],
      providers: [
        {
          provide: NowLiveService,
          useValue: mockNowLiveService,
        },
        {
          provide: ConfigService,
          useValue: { get: jest.fn() },
        },
      ],
    }).compile();

    controller = module.get<NowLiveController>(NowLiveController);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  it('should be defined', () => {
    expect(controller).toBeDefined();
  });

  describe('findAll', () => {
    it('should return the tracked streamers', () => {
      const streamers = [{ id: '1', login: 'alice' }];
      mockNowLiveService.getUsers.mockReturnValue(streamers);

      expect(controller.findAll()).toBe(streamers);
    });
  });

  describe('add', () => {
    it('should return the result on success', async () => {
      mockNowLiveService.addUser.mockResolvedValue(UserManagementResult.Success);

      await expect(controller.add({ login: 'alice' })).resolves.toEqual({ login: 'alice', result: 'Success' });
      expect(mockNowLiveService.addUser).toHaveBeenCalledWith('alice');
    });

    it('should map NotFound to 404', async () => {
      mockNowLiveService.addUser.mockResolvedValue(UserManagementResult.NotFound);

      await expect(controller.add({ login: 'nobody' })).rejects.toThrow(NotFoundException);
    });

    it('should map AlreadyExists to 409', async () => {
      mockNowLiveService.addUser.mockResolvedValue(UserManagementResult.AlreadyExists);

      await expect(controller.add({ login: 'alice' })).rejects.toThrow(ConflictException);
    });
  });

  describe('remove', () => {
    it('should return the result on success', async () => {
      mockNowLiveService.removeUser.mockResolvedValue(UserManagementResult.Success);

      await expect(controller.remove('Alice')).resolves.toEqual({ login: 'Alice', result: 'Success' });
      expect(mockNowLiveService.removeUser).toHaveBeenCalledWith('Alice');
    });

    it('should map NotFound to 404', async () => {
      mockNowLiveService.removeUser.mockResolvedValue(UserManagementResult.NotFound);

      await expect(controller.remove('nobody')).rejects.toThrow(NotFoundException);
    });

    it('should map Error to 500', async () => {
      mockNowLiveService.removeUser.mockResolvedValue(UserManagementResult.Error);

      await expect(controller.remove('alice')).rejects.toThrow(InternalServerErrorException);
    });
  });

  describe('AddStreamerDto', () => {
    it.each(['alice', 'Some_Streamer_42', 'abc'])('should accept "%s"', async (login) => {
      const errors = await validate(plainToInstance(AddStreamerDto, { login }));

      expect(errors).toHaveLength(0);
    });

    it.each(['ab', 'has space', 'semi;colon', 'a'.repeat(26)])('should reject "%s"', async (login) => {
      const errors = await validate(plainToInstance(AddStreamerDto, { login }));

      expect(errors.map((error) => error.property)).toEqual(['login']);
    });
  });
});
