import { main } from '@/podscribe';
import { describeError } from '@/errors';

main().catch((error: unknown) => {
    process.stderr.write(`Error: ${describeError(error)}\n`);
    process.exit(1);
});
