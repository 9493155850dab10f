import { Module } from '@nestjs/common';
import { SIGN_IN_PROVIDER } from '../auth/sign-in-provider.interface';
import { SCREEN_HOST } from '../screens/screen-host.interface';
import { TERMINAL_STREAMS, TerminalIo, type TerminalStreams } from './terminal-io';
import { TerminalScreenHost } from './terminal-screen.host';
import { TerminalSignInProvider } from './terminal-sign-in.provider';

@Module({
  providers: [
    {
      provide: TERMINAL_STREAMS,
      useValue: { input: process.stdin, output: process.stdout } satisfies TerminalStreams,
    },
    TerminalIo,
    TerminalScreenHost,
    { provide: SCREEN_HOST, useExisting: TerminalScreenHost },
    { provide: SIGN_IN_PROVIDER, useClass: TerminalSignInProvider },
  ],
  exports: [TerminalIo, TerminalScreenHost, SCREEN_HOST, SIGN_IN_PROVIDER],
})
export class TerminalModule {}
