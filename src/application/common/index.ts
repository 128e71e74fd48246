export { Either, Left, Right, left, right, fold } from './either';
