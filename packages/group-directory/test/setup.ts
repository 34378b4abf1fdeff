import { Logger } from '@nestjs/common';

// Silence package logs during specs
Logger.overrideLogger(false);
