import { Command, Option } from 'commander';
import packageJson from '../package.json';
import { createApp } from './app';
import { CLI } from './cli';
import { toCliOptions, type CommandFlags } from './cli/options';
import { config } from './core/config';
import { logger } from './core/logger';
import { VIDEO_QUALITIES } from './types';

const program = new Command();

program
  .name('tubefetch')
  .description('Download YouTube audio or video with yt-dlp and ffmpeg')
  .version(packageJson.version)
  .argument('[url]', 'YouTube URL or video id; omit for interactive mode')
  .option('-a, --audio', 'download audio only')
  .option('-o, --output <dir>', 'output directory', config.DOWNLOAD_DIR)
  .addOption(new Option('-q, --quality <quality>', 'video quality').choices(VIDEO_QUALITIES).default('highest'))
  .option('-f, --audio-format <id>', 'audio format id (see --list)')
  .option('-s, --subs <langs>', 'comma-separated subtitle language codes, e.g. "en,de"')
  .option('--embed-subs', 'mux downloaded subtitles into the video')
  .option('--keep-original', 'keep the un-muxed media and subtitle files')
  .option('--no-thumbnail', 'do not embed the thumbnail')
  .option('--no-metadata', 'do not embed title/description metadata')
  .option('--no-chapters', 'do not embed chapters')
  .option('-l, --list', 'list audio tracks and subtitles, then exit')
  .action(async (url: string | undefined, flags: CommandFlags) => {
    const cli = new CLI(createApp(config));
    const options = toCliOptions(url, flags);

    if (!options.url) {
      await cli.runInteractive(options);
      return;
    }

    const ok = flags.list ? await cli.listStreams(options.url) : await cli.runOnce({ ...options, url: options.url });
    if (!ok) process.exitCode = 1;
  });

program.on('--help', () => {
  console.log('');
  console.log('Examples:');
  console.log('  $ tubefetch                                   # Interactive mode');
  console.log('  $ tubefetch https://youtu.be/<id> --list      # Show audio tracks and subtitles');
  console.log('  $ tubefetch <id> -a -f 251                    # Audio only, specific track');
  console.log('  $ tubefetch <id> -q 720p -s en,de --embed-subs');
  console.log('');
});

program.parseAsync().catch((error: unknown) => {
  // enquirer rejects with an empty string when a prompt is cancelled (Ctrl+C)
  if (error === '') {
    process.exitCode = 130;
    return;
  }
  logger.fatal({ error: error instanceof Error ? error.message : String(error) }, 'Unhandled error');
  console.error('Error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
