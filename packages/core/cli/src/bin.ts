import {run} from './cli';

run(process.argv);
