type ChalkFormatter = (text: string) => string;

function buildFormatter(openCode: number, closeCode: number): ChalkFormatter {
  return (text: string) => `\u001B[${openCode}m${text}\u001B[${closeCode}m`;
}

const chalkMock = {
  black: buildFormatter(30, 39),
  red: buildFormatter(31, 39),
  green: buildFormatter(32, 39),
  yellow: buildFormatter(33, 39),
  blue: buildFormatter(34, 39),
  magenta: buildFormatter(35, 39),
  cyan: buildFormatter(36, 39),
  white: buildFormatter(37, 39),
  gray: buildFormatter(90, 39),
  blackBright: buildFormatter(90, 39),
  redBright: buildFormatter(91, 39),
  greenBright: buildFormatter(92, 39),
  yellowBright: buildFormatter(93, 39),
  blueBright: buildFormatter(94, 39),
  magentaBright: buildFormatter(95, 39),
  cyanBright: buildFormatter(96, 39),
  whiteBright: buildFormatter(97, 39),
  bgBlack: buildFormatter(40, 49),
  bgRed: buildFormatter(41, 49),
  bgGreen: buildFormatter(42, 49),
  bgYellow: buildFormatter(43, 49),
  bgBlue: buildFormatter(44, 49),
  bgMagenta: buildFormatter(45, 49),
  bgCyan: buildFormatter(46, 49),
  bgWhite: buildFormatter(47, 49),
  bgBlackBright: buildFormatter(100, 49),
  bgRedBright: buildFormatter(101, 49),
  bgGreenBright: buildFormatter(102, 49),
  bgYellowBright: buildFormatter(103, 49),
  bgBlueBright: buildFormatter(104, 49),
  bgMagentaBright: buildFormatter(105, 49),
  bgCyanBright: buildFormatter(106, 49),
  bgWhiteBright: buildFormatter(107, 49),
  bold: buildFormatter(1, 22),
  dim: buildFormatter(2, 22),
  italic: buildFormatter(3, 23),
  underline: buildFormatter(4, 24),
  inverse: buildFormatter(7, 27),
  hidden: buildFormatter(8, 28),
};

export default chalkMock;
