import { injectable } from 'inversify';
import { IClock } from '../../domain/interfaces/IClock';

@injectable()
export class SystemClock implements IClock {
    now(): Date {
        return new Date();
    }
}
