/**
 * Exercise Service Tests
 */

import { PoolClient } from 'pg';
import { transaction } from '../../src/config/database';
import { InvalidInputError, NotFoundError } from '../../src/models/errors';
import { ExerciseRepository } from '../../src/repositories/exercise-repository';
import { ExerciseService } from '../../src/services/exercise-service';

jest.mock('../../src/config/database', () => ({ transaction: jest.fn() }));
jest.mock('../../src/repositories/exercise-repository');

describe('ExerciseService', () => {
  const client = { query: jest.fn() } as unknown as PoolClient;
  const mockTransaction = jest.mocked(transaction);
  let exerciseRepository: jest.Mocked<ExerciseRepository>;
  let service: ExerciseService;

  beforeEach(() => {
    mockTransaction.mockImplementation(async (_operation, callback) => callback(client));
    exerciseRepository = jest.mocked(new ExerciseRepository());
    service = new ExerciseService(exerciseRepository);
  });

  describe('getCategoriesAndExercisesWithRatings', () => {
    it('should group the player\'s progress by category', async () => {
      exerciseRepository.findProgressByPlayer.mockResolvedValue([
        { category: 'PAC', exercise: 'Sprint Speed', result: '7.1s', rating: 4 },
        { category: 'SHO', exercise: 'Long Shots', result: null, rating: null },
      ]);

      const sheet = await service.getCategoriesAndExercisesWithRatings(7);

      expect(exerciseRepository.findProgressByPlayer).toHaveBeenCalledWith(client, 7);
      expect(sheet).toEqual({
        PAC: [{ exercise: 'Sprint Speed', result: '7.1s', rating: 4 }],
        SHO: [{ exercise: 'Long Shots', result: null, rating: null }],
      });
    });
  });

  describe('updateExercise', () => {
    it('should write result and rating', async () => {
      exerciseRepository.findIdByName.mockResolvedValue(9);
      exerciseRepository.updateForPlayer.mockResolvedValue(1);

      const outcome = await service.updateExercise({
        exercise: 'Stepovers',
        playerId: 7,
        result: '12 reps',
        rating: 4,
      });

      expect(outcome).toEqual({ success: true, message: 'Exercise updated successfully.' });
      expect(exerciseRepository.findIdByName).toHaveBeenCalledWith(client, 'Stepovers');
      expect(exerciseRepository.updateForPlayer).toHaveBeenCalledWith(client, 7, 9, [
        { column: 'result', value: '12 reps' },
        { column: 'rating', value: 4 },
      ]);
    });

    it('should skip a placeholder result', async () => {
      exerciseRepository.findIdByName.mockResolvedValue(9);
      exerciseRepository.updateForPlayer.mockResolvedValue(1);

      await service.updateExercise({ exercise: 'Stepovers', playerId: 7, result: 'N/A', rating: 2 });

      expect(exerciseRepository.updateForPlayer).toHaveBeenCalledWith(client, 7, 9, [
        { column: 'rating', value: 2 },
      ]);
    });

    it('should skip a zero rating', async () => {
      exerciseRepository.findIdByName.mockResolvedValue(9);
      exerciseRepository.updateForPlayer.mockResolvedValue(1);

      await service.updateExercise({ exercise: 'Stepovers', playerId: 7, result: '15 reps', rating: 0 });

      expect(exerciseRepository.updateForPlayer).toHaveBeenCalledWith(client, 7, 9, [
        { column: 'result', value: '15 reps' },
      ]);
    });

    it('should report a player without a row for the exercise', async () => {
      exerciseRepository.findIdByName.mockResolvedValue(9);
      exerciseRepository.updateForPlayer.mockResolvedValue(0);

      const outcome = await service.updateExercise({ exercise: 'Stepovers', playerId: 99, rating: 3 });

      expect(outcome).toEqual({ success: false, error: 'No matching exercise found for this player.' });
    });

    it('should reject an unknown exercise', async () => {
      exerciseRepository.findIdByName.mockResolvedValue(null);

      const promise = service.updateExercise({ exercise: 'Rabona', playerId: 7, rating: 3 });

      await expect(promise).rejects.toBeInstanceOf(NotFoundError);
      await expect(promise).rejects.toThrow("Exercise 'Rabona' not found");
      expect(exerciseRepository.updateForPlayer).not.toHaveBeenCalled();
    });

    it('should require a result or a rating', async () => {
      await expect(
        service.updateExercise({ exercise: 'Stepovers', playerId: 7, result: 'N/A', rating: 0 })
      ).rejects.toThrow("At least one of 'result' or 'rating' must be provided and valid");
      expect(mockTransaction).not.toHaveBeenCalled();
    });

    it('should require the exercise name', async () => {
      await expect(service.updateExercise({ exercise: '', playerId: 7, rating: 3 })).rejects.toThrow(
        'Exercise name is required'
      );
    });

    it('should reject a rating outside 1-5', async () => {
      const promise = service.updateExercise({ exercise: 'Stepovers', playerId: 7, rating: 6 });

      await expect(promise).rejects.toBeInstanceOf(InvalidInputError);
      await expect(promise).rejects.toThrow('Invalid exercise update');
      expect(mockTransaction).not.toHaveBeenCalled();
    });
  });
});
